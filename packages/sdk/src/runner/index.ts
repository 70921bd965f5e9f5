/**
 * Runner module - executes commands, retries transient failures and decodes
 * server errors
 * @module runner
 */

import { randomUUID } from 'node:crypto';
import { Subject, type Observable } from 'rxjs';
import { z } from 'zod';
import { HeaderName, type Command } from '../command/index.js';
import {
  resolveRetryConfig,
  type ConnectionConfig,
  type RetryConfig,
} from '../config/index.js';
import {
  ErrorCode,
  ObjectStoreError,
  OperationCancelledError,
  describeError,
  errorCodeFromServer,
} from '../errors/index.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';
import type {
  ProgressSink,
  WebClient,
  WebRequest,
  WebResponse,
} from '../network/index.js';
import { isJsonObject, isJsonValue, type JsonObject, type JsonValue } from '../types.js';

/**
 * Lifecycle of one command invocation
 */
export enum CommandState {
  BUILT = 'built',
  DISPATCHED = 'dispatched',
  RETRYING = 'retrying',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/**
 * State change of an invocation, published on {@link CommandRunner.transitions$}
 */
export interface CommandTransition {
  requestId: string;
  method: Command['method'];
  path: string;
  state: CommandState;
  /** Zero-based attempt the transition belongs to */
  attempt: number;
  /** Delay before the next attempt, for RETRYING */
  delay?: number;
  error?: ObjectStoreError;
}

/**
 * Decoded successful response
 */
export interface CommandResult {
  statusCode: number;
  data: JsonObject;
}

/**
 * Source of the application identity attached to every command
 */
export interface InstallationIdProvider {
  get(): Promise<string | null>;
}

/**
 * Supplies the current user's session token, if any
 */
export interface SessionProvider {
  getSessionToken(): Promise<string | null>;
}

/**
 * Per-invocation options
 */
export interface RunOptions {
  signal?: AbortSignal;
  uploadProgress?: ProgressSink;
  downloadProgress?: ProgressSink;
  /** Attach the master key; only honoured when one is configured */
  useMasterKey?: boolean;
}

/**
 * Collaborators and settings of a runner
 */
export interface CommandRunnerConfig {
  webClient: WebClient;
  installation: InstallationIdProvider;
  connection: ConnectionConfig;
  session?: SessionProvider;
  retry?: RetryConfig;
  logger?: Logger;
}

const serverErrorSchema = z.object({
  code: z.number().int(),
  error: z.string(),
});

/**
 * Classification of one transport exchange
 */
export type AttemptOutcome =
  | { outcome: 'success'; result: CommandResult }
  | { outcome: 'failure'; error: ObjectStoreError; transient: boolean };

/**
 * Command runner - turns commands into transport calls
 *
 * Success responses are normalized to a JSON mapping; every failure surfaces
 * as an {@link ObjectStoreError}, or an {@link OperationCancelledError} when
 * the caller aborts. Connection failures and 5xx responses are retried with
 * capped exponential backoff.
 */
export class CommandRunner {
  private readonly webClient: WebClient;
  private readonly installation: InstallationIdProvider;
  private readonly connection: ConnectionConfig;
  private readonly session?: SessionProvider;
  private readonly retry: Required<RetryConfig>;
  private readonly log: Logger;
  private readonly transitionsSubject = new Subject<CommandTransition>();

  /**
   * Observable of state changes of every invocation
   */
  public readonly transitions$: Observable<CommandTransition> =
    this.transitionsSubject.asObservable();

  constructor(config: CommandRunnerConfig) {
    this.webClient = config.webClient;
    this.installation = config.installation;
    this.connection = config.connection;
    this.session = config.session;
    this.retry = resolveRetryConfig(config.retry);
    this.log = (config.logger ?? rootLogger).child({ module: 'runner' });
  }

  /**
   * Execute a command
   *
   * @returns The decoded response
   * @throws ObjectStoreError for terminal failures
   * @throws OperationCancelledError when `options.signal` aborts
   *
   * Failures of the installation or session providers propagate unchanged.
   */
  async run(command: Command, options: RunOptions = {}): Promise<CommandResult> {
    const requestId = randomUUID();
    const emit = (state: CommandState, attempt: number, extra: Partial<CommandTransition> = {}) =>
      this.transitionsSubject.next({
        requestId,
        method: command.method,
        path: command.path,
        state,
        attempt,
        ...extra,
      });

    emit(CommandState.BUILT, 0);

    for (let attempt = 0; ; attempt++) {
      if (options.signal?.aborted) {
        emit(CommandState.CANCELLED, attempt);
        throw new OperationCancelledError(undefined, { cause: options.signal.reason });
      }

      emit(CommandState.DISPATCHED, attempt);
      this.log.debug(
        { requestId, method: command.method, path: command.path, attempt },
        'Dispatching command'
      );

      const result = await this.attempt(command, requestId, options);

      if (options.signal?.aborted) {
        emit(CommandState.CANCELLED, attempt);
        throw new OperationCancelledError(undefined, { cause: options.signal.reason });
      }

      if (result.outcome === 'success') {
        emit(CommandState.SUCCEEDED, attempt);
        return result.result;
      }

      if (!result.transient || attempt >= this.retry.maxRetries) {
        emit(CommandState.FAILED, attempt, { error: result.error });
        this.log.warn(
          { requestId, path: command.path, code: result.error.code, attempts: attempt + 1 },
          `Command failed: ${result.error.message}`
        );
        throw result.error;
      }

      const delay = this.calculateRetryDelay(attempt);
      emit(CommandState.RETRYING, attempt, { delay, error: result.error });
      this.log.warn(
        { requestId, path: command.path, code: result.error.code, attempt, delay },
        'Transient failure, retrying'
      );

      try {
        await sleep(delay, options.signal);
      } catch (error) {
        emit(CommandState.CANCELLED, attempt);
        throw new OperationCancelledError(undefined, { cause: error });
      }
    }
  }

  /**
   * Delay before retry number `attempt + 1`
   */
  calculateRetryDelay(attempt: number): number {
    const delay = this.retry.retryDelay * Math.pow(this.retry.retryBackoffMultiplier, attempt);
    return Math.min(delay, this.retry.maxRetryDelay);
  }

  /**
   * Release subscribers of {@link transitions$}
   */
  destroy(): void {
    this.transitionsSubject.complete();
  }

  private async attempt(command: Command, requestId: string, options: RunOptions): Promise<AttemptOutcome> {
    const request = await this.prepareRequest(command, requestId, options);
    let response: WebResponse;

    try {
      response = await this.webClient.execute(request, {
        signal: options.signal,
        uploadProgress: options.uploadProgress,
        downloadProgress: options.downloadProgress,
      });
    } catch (error) {
      return {
        outcome: 'failure',
        error: new ObjectStoreError(
          ErrorCode.ConnectionFailed,
          `Connection failed: ${describeError(error)}`,
          { cause: error }
        ),
        transient: true,
      };
    }

    return interpretResponse(response);
  }

  /**
   * Attach identity, session and key headers to the command's own
   */
  private async prepareRequest(
    command: Command,
    requestId: string,
    options: RunOptions
  ): Promise<WebRequest> {
    const headers: Record<string, string> = { ...this.connection.auxiliaryHeaders };

    for (const [name, value] of command.headers) {
      headers[name] = value;
    }

    const installationId = await this.installation.get();
    if (installationId) {
      headers[HeaderName.InstallationId] = installationId;
    }

    headers[HeaderName.ApplicationId] = this.connection.applicationId;
    if (this.connection.clientKey) {
      headers[HeaderName.ClientKey] = this.connection.clientKey;
    }
    if (options.useMasterKey && this.connection.masterKey) {
      headers[HeaderName.MasterKey] = this.connection.masterKey;
    }

    const version = this.connection.versionInfo;
    if (version?.buildVersion) {
      headers[HeaderName.AppBuildVersion] = version.buildVersion;
    }
    if (version?.displayVersion) {
      headers[HeaderName.AppDisplayVersion] = version.displayVersion;
    }
    if (version?.osVersion) {
      headers[HeaderName.OSVersion] = version.osVersion;
    }

    if (!command.sessionToken && this.session) {
      const sessionToken = await this.session.getSessionToken();
      if (sessionToken) {
        headers[HeaderName.SessionToken] = sessionToken;
      }
    }

    headers[HeaderName.RequestId] = requestId;

    const request: WebRequest = {
      target: command.target,
      method: command.method,
      headers,
    };

    if (command.body !== undefined) {
      headers[HeaderName.ContentType] = 'application/json';
      request.body = JSON.stringify(command.body);
    }

    return request;
  }
}

function parseJson(body: string): JsonValue | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Classify a raw response into a result or a typed failure
 */
export function interpretResponse(response: WebResponse): AttemptOutcome {
  const { status, body } = response;

  if (status >= 200 && status < 300) {
    if (body === null || body.trim() === '') {
      return { outcome: 'success', result: { statusCode: status, data: {} } };
    }

    const parsed = parseJson(body);
    if (Array.isArray(parsed)) {
      return { outcome: 'success', result: { statusCode: status, data: { results: parsed } } };
    }
    if (isJsonObject(parsed)) {
      return { outcome: 'success', result: { statusCode: status, data: parsed } };
    }

    return {
      outcome: 'failure',
      error: new ObjectStoreError(
        ErrorCode.OtherCause,
        'Malformed response: the server replied with a body that is not a JSON object.',
        { status }
      ),
      transient: false,
    };
  }

  const transient = status >= 500;
  const decoded = serverErrorSchema.safeParse(body === null ? undefined : parseJson(body));

  // Server-side failures keep the decoded code only as detail
  if (decoded.success) {
    return {
      outcome: 'failure',
      error: new ObjectStoreError(
        transient ? ErrorCode.InternalServerError : errorCodeFromServer(decoded.data.code),
        decoded.data.error,
        {
          status,
          serverCode: decoded.data.code,
        }
      ),
      transient,
    };
  }

  return {
    outcome: 'failure',
    error: new ObjectStoreError(
      transient ? ErrorCode.InternalServerError : ErrorCode.OtherCause,
      body ? `Request failed with status ${status}: ${body}` : `Request failed with status ${status}.`,
      { status }
    ),
    transient,
  };
}

/**
 * Wait, rejecting early when the signal aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
