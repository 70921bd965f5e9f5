/**
 * Error taxonomy shared by the command runner and the operation algebra
 * @module errors
 */

/**
 * Error codes reported by the object store, plus the client-side
 * codes the runner synthesizes when no structured error is available.
 */
export enum ErrorCode {
  OtherCause = -1,
  InternalServerError = 1,
  ConnectionFailed = 100,
  ObjectNotFound = 101,
  InvalidQuery = 102,
  InvalidClassName = 103,
  MissingObjectId = 104,
  InvalidKeyName = 105,
  InvalidPointer = 106,
  InvalidJSON = 107,
  CommandUnavailable = 108,
  NotInitialized = 109,
  IncorrectType = 111,
  ObjectTooLarge = 116,
  OperationForbidden = 119,
  CacheMiss = 120,
  InvalidNestedKey = 121,
  InvalidFileName = 122,
  InvalidACL = 123,
  Timeout = 124,
  InvalidEmailAddress = 125,
  DuplicateValue = 137,
  InvalidRoleName = 139,
  ExceededQuota = 140,
  ScriptFailed = 141,
  ValidationFailed = 142,
  FileDeleteFailed = 153,
  UsernameMissing = 200,
  PasswordMissing = 201,
  UsernameTaken = 202,
  EmailTaken = 203,
  EmailMissing = 204,
  EmailNotFound = 205,
  SessionMissing = 206,
  MustCreateUserThroughSignup = 207,
  AccountAlreadyLinked = 208,
  InvalidSessionToken = 209,
  LinkedIdMissing = 250,
  InvalidLinkedSession = 251,
  UnsupportedService = 252,
}

const KNOWN_CODES = new Map<number, ErrorCode>(
  Object.values(ErrorCode)
    .filter((value): value is ErrorCode => typeof value === 'number')
    .map((code): [number, ErrorCode] => [code, code])
);

/**
 * Map a numeric code from a server error body to a known error code.
 * Unrecognized codes collapse to {@link ErrorCode.OtherCause}.
 */
export function errorCodeFromServer(code: number): ErrorCode {
  return KNOWN_CODES.get(code) ?? ErrorCode.OtherCause;
}

/**
 * Options accepted by {@link ObjectStoreError}
 */
export interface ObjectStoreErrorOptions {
  /** HTTP status of the response that produced the error */
  status?: number;
  /** Code exactly as the server sent it, when one was decoded */
  serverCode?: number;
  cause?: unknown;
}

/**
 * Terminal failure of a command or of a local operation on field data.
 */
export class ObjectStoreError extends Error {
  readonly code: ErrorCode;
  readonly status?: number;
  readonly serverCode?: number;

  constructor(code: ErrorCode, message: string, options: ObjectStoreErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ObjectStoreError';
    this.code = code;
    this.status = options.status;
    this.serverCode = options.serverCode;
  }

  /**
   * Whether the runner treats this failure as transient
   */
  get isTransient(): boolean {
    return (
      this.code === ErrorCode.ConnectionFailed ||
      (this.status !== undefined && this.status >= 500)
    );
  }
}

/**
 * Raised when a command is abandoned through its abort signal.
 * Not an {@link ObjectStoreError}: the remote call neither succeeded nor failed.
 */
export class OperationCancelledError extends Error {
  constructor(message = 'The operation was cancelled.', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OperationCancelledError';
  }
}

/**
 * Programming error in the calling layer, e.g. an operation queued on top
 * of one it cannot be combined with.
 */
export class InvalidOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOperationError';
  }
}

/**
 * Thrown when client configuration is missing or malformed.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Human readable text for any thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
