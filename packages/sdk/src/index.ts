/**
 * ObjectSync SDK
 *
 * Client for a remote object store: commands with retry and cancellation,
 * installation identity, and field operations composed while offline.
 *
 * @packageDocumentation
 */

// Errors
export * from './errors/index.js';

// Logging and configuration
export * from './logger/index.js';
export * from './config/index.js';

// Storage
export * from './storage/index.js';

// Installation
export * from './installation/index.js';

// Field operations; constructors live under a namespace (`Operations.set(...)`)
export * as Operations from './operations/index.js';
export {
  PendingOperationSet,
  type FieldOperation,
  type FieldOperationKind,
  type ObjectReference,
  type Pointer,
} from './operations/index.js';

// Commands and transport
export * from './command/index.js';
export * from './network/index.js';
export * from './runner/index.js';

// Objects
export * from './objects/index.js';

// Client
export * from './client/index.js';

export { isJsonObject, isJsonValue } from './types.js';
export type { JsonObject, JsonPrimitive, JsonValue } from './types.js';
export { VERSION, CLIENT_VERSION } from './version.js';
