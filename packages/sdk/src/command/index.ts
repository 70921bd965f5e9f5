/**
 * Command module - immutable description of one remote call
 * @module command
 */

import { DEFAULT_SERVER_URL, normalizeServerUrl } from '../config/index.js';
import { frozenCopy, type JsonValue } from '../types.js';
import { CLIENT_VERSION } from '../version.js';

/**
 * HTTP verbs understood by the object store
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Path segment every endpoint is resolved under
 */
export const API_VERSION_PREFIX = '/1/';

/**
 * Header names exchanged with the object store
 */
export const HeaderName = {
  ClientVersion: 'X-Client-Version',
  SessionToken: 'X-Session-Token',
  InstallationId: 'X-Installation-Id',
  ApplicationId: 'X-Application-Id',
  ClientKey: 'X-Client-Key',
  MasterKey: 'X-Master-Key',
  RequestId: 'X-Request-Id',
  AppBuildVersion: 'X-App-Build-Version',
  AppDisplayVersion: 'X-App-Display-Version',
  OSVersion: 'X-OS-Version',
  ContentType: 'Content-Type',
} as const;

const PROTECTED_HEADERS = new Set([
  HeaderName.ClientVersion.toLowerCase(),
  HeaderName.SessionToken.toLowerCase(),
]);

/**
 * Arguments for building a {@link Command}
 */
export interface CommandInit {
  /** Endpoint below the API version prefix, e.g. `classes/Todo` */
  endpoint: string;
  method: HttpMethod;
  sessionToken?: string | null;
  /** Extra headers; they never replace the identity or session headers */
  headers?: Record<string, string>;
  body?: JsonValue;
  /** Server the endpoint is resolved against */
  serverUrl?: string;
}

/**
 * One remote call: path, verb, headers and payload.
 * Building a command performs no I/O; the runner executes it.
 *
 * @example
 * ```typescript
 * const command = new Command({
 *   endpoint: 'classes/Todo',
 *   method: 'POST',
 *   sessionToken: 'r:test-session',
 *   body: { text: 'write tests' },
 * });
 *
 * command.path;   // '/1/classes/Todo'
 * command.target; // 'http://localhost:1337/1/classes/Todo'
 * ```
 */
export class Command {
  readonly path: string;
  readonly method: HttpMethod;
  readonly headers: ReadonlyMap<string, string>;
  readonly body?: JsonValue;
  readonly target: string;
  readonly sessionToken?: string;

  constructor(init: CommandInit) {
    this.path = `${API_VERSION_PREFIX}${init.endpoint.replace(/^\/+/, '')}`;
    this.method = init.method;
    this.target = new URL(
      this.path.slice(1),
      normalizeServerUrl(init.serverUrl ?? DEFAULT_SERVER_URL)
    ).href;

    const headers = new Map<string, string>();
    const seen = new Map<string, string>();

    for (const [name, value] of Object.entries(init.headers ?? {})) {
      const lower = name.toLowerCase();
      if (PROTECTED_HEADERS.has(lower)) {
        continue;
      }
      const previous = seen.get(lower);
      if (previous !== undefined) {
        headers.delete(previous);
      }
      seen.set(lower, name);
      headers.set(name, value);
    }

    headers.set(HeaderName.ClientVersion, CLIENT_VERSION);

    if (init.sessionToken) {
      this.sessionToken = init.sessionToken;
      headers.set(HeaderName.SessionToken, init.sessionToken);
    }

    this.headers = headers;

    if (init.body !== undefined) {
      this.body = frozenCopy(init.body);
    }

    Object.freeze(this);
  }

  /**
   * Whether a header is present, ignoring case
   */
  hasHeader(name: string): boolean {
    const lower = name.toLowerCase();
    for (const key of this.headers.keys()) {
      if (key.toLowerCase() === lower) {
        return true;
      }
    }
    return false;
  }
}
