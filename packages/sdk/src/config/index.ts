/**
 * Config module - connection, retry and logging settings
 * @module config
 */

import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { ConfigurationError } from '../errors/index.js';

/**
 * Server used when neither the caller nor the environment names one
 */
export const DEFAULT_SERVER_URL = 'http://localhost:1337/';

/**
 * Version information of the host application, sent with every command
 */
export interface VersionInfo {
  buildVersion?: string;
  displayVersion?: string;
  osVersion?: string;
}

/**
 * Identity of the application and the server it talks to
 */
export interface ConnectionConfig {
  serverUrl: string;
  applicationId: string;
  clientKey?: string;
  masterKey?: string;
  /** Extra headers sent with every command */
  auxiliaryHeaders?: Record<string, string>;
  versionInfo?: VersionInfo;
}

/**
 * Retry policy for transient failures
 */
export interface RetryConfig {
  maxRetries?: number;
  retryDelay?: number;
  retryBackoffMultiplier?: number;
  maxRetryDelay?: number;
}

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 4,
  retryDelay: 1000,
  retryBackoffMultiplier: 2,
  maxRetryDelay: 10000,
};

const RETRY_KEYS: ReadonlyArray<keyof RetryConfig> = [
  'maxRetries',
  'retryDelay',
  'retryBackoffMultiplier',
  'maxRetryDelay',
];

/**
 * Settings resolved from the process environment
 */
export interface EnvironmentConfig {
  connection: ConnectionConfig;
  retry: RetryConfig;
  logLevel: LevelWithSilent;
}

const environmentSchema = z.object({
  OBJECTSTORE_SERVER_URL: z.string().url().default(DEFAULT_SERVER_URL),
  OBJECTSTORE_APPLICATION_ID: z.string().default(''),
  OBJECTSTORE_CLIENT_KEY: z.string().min(1).optional(),
  OBJECTSTORE_MASTER_KEY: z.string().min(1).optional(),
  OBJECTSTORE_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  OBJECTSTORE_MAX_RETRIES: z.coerce.number().int().min(0).optional(),
});

/**
 * Ensure the server URL ends with a slash so relative paths resolve below it
 */
export function normalizeServerUrl(serverUrl: string): string {
  return serverUrl.endsWith('/') ? serverUrl : `${serverUrl}/`;
}

/**
 * Read SDK settings from environment variables
 *
 * @param env - Variables to read, the process environment by default
 * @throws ConfigurationError when a variable is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const parsed = environmentSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${details}`, {
      cause: parsed.error,
    });
  }

  const values = parsed.data;
  const retry: RetryConfig = {};
  if (values.OBJECTSTORE_MAX_RETRIES !== undefined) {
    retry.maxRetries = values.OBJECTSTORE_MAX_RETRIES;
  }

  return {
    connection: {
      serverUrl: normalizeServerUrl(values.OBJECTSTORE_SERVER_URL),
      applicationId: values.OBJECTSTORE_APPLICATION_ID,
      clientKey: values.OBJECTSTORE_CLIENT_KEY,
      masterKey: values.OBJECTSTORE_MASTER_KEY,
    },
    retry,
    logLevel: values.OBJECTSTORE_LOG_LEVEL,
  };
}

/**
 * Merge caller retry settings over the defaults
 */
export function resolveRetryConfig(config: RetryConfig = {}): Required<RetryConfig> {
  const resolved = { ...DEFAULT_RETRY_CONFIG };

  for (const key of RETRY_KEYS) {
    const value = config[key];
    if (value !== undefined) {
      if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(`Retry setting ${key} must be a non-negative number.`);
      }
      resolved[key] = value;
    }
  }

  return resolved;
}
