/**
 * Client module - main SDK entry point wiring the object store services
 * @module client
 */

import type { LevelWithSilent } from 'pino';
import { Command, type CommandInit } from '../command/index.js';
import {
  loadConfig,
  normalizeServerUrl,
  type ConnectionConfig,
  type RetryConfig,
} from '../config/index.js';
import { InstallationController } from '../installation/index.js';
import { createLogger, type Logger } from '../logger/index.js';
import { FetchWebClient, type WebClient } from '../network/index.js';
import { ObjectController, StoredObject } from '../objects/index.js';
import {
  CommandRunner,
  type CommandResult,
  type RunOptions,
  type SessionProvider,
} from '../runner/index.js';
import { MemoryStorageController, type StorageController } from '../storage/index.js';
import type { JsonObject } from '../types.js';

/**
 * SDK client configuration; anything left out is read from the environment
 */
export interface ClientConfig {
  connection?: Partial<ConnectionConfig>;
  retry?: RetryConfig;
  logLevel?: LevelWithSilent;
  /** Request timeout of the default transport, in milliseconds */
  timeout?: number;
  storage?: StorageController;
  webClient?: WebClient;
  session?: SessionProvider;
  logger?: Logger;
  /** Environment to read defaults from, the process environment by default */
  env?: NodeJS.ProcessEnv;
}

function definedEntries<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

/**
 * SDK client - main entry point for talking to the object store
 *
 * @example
 * ```typescript
 * const client = new ObjectStoreClient({
 *   connection: { serverUrl: 'https://objects.example.com/', applicationId: 'test-app' },
 * });
 *
 * const todo = client.createObject('Todo', { text: 'write tests' });
 * await client.objects.save(todo);
 * ```
 */
export class ObjectStoreClient {
  readonly connection: ConnectionConfig;
  readonly logger: Logger;
  readonly storage: StorageController;
  readonly installation: InstallationController;
  readonly runner: CommandRunner;
  readonly objects: ObjectController;

  constructor(config: ClientConfig = {}) {
    const environment = loadConfig(config.env);

    const connection: ConnectionConfig = {
      ...environment.connection,
      ...definedEntries(config.connection ?? {}),
    };
    connection.serverUrl = normalizeServerUrl(connection.serverUrl);
    this.connection = connection;

    this.logger = config.logger ?? createLogger({ level: config.logLevel ?? environment.logLevel });
    this.storage = config.storage ?? new MemoryStorageController();
    this.installation = new InstallationController(this.storage, this.logger);

    this.runner = new CommandRunner({
      webClient: config.webClient ?? new FetchWebClient(definedEntries({ timeout: config.timeout })),
      installation: this.installation,
      connection,
      session: config.session,
      retry: { ...environment.retry, ...definedEntries(config.retry ?? {}) },
      logger: this.logger,
    });

    this.objects = new ObjectController(this.runner, {
      serverUrl: connection.serverUrl,
      logger: this.logger,
    });
  }

  /**
   * Build a command against the configured server
   */
  command(init: Omit<CommandInit, 'serverUrl'>): Command {
    return new Command({ ...init, serverUrl: this.connection.serverUrl });
  }

  /**
   * Build and run a command in one step
   */
  run(init: Omit<CommandInit, 'serverUrl'>, options?: RunOptions): Promise<CommandResult> {
    return this.runner.run(this.command(init), options);
  }

  /**
   * New unsaved object of a class
   */
  createObject(className: string, attributes?: JsonObject): StoredObject {
    return new StoredObject(className, attributes);
  }

  /**
   * Release the runner's subscribers
   */
  destroy(): void {
    this.runner.destroy();
  }
}

/**
 * Global client instance
 */
let globalClient: ObjectStoreClient | null = null;

/**
 * Get or create the global SDK client instance
 */
export function getClient(config?: ClientConfig): ObjectStoreClient {
  if (!globalClient) {
    globalClient = new ObjectStoreClient(config);
  }
  return globalClient;
}

/**
 * Reset the global client instance
 */
export function resetClient(): void {
  if (globalClient) {
    globalClient.destroy();
    globalClient = null;
  }
}
