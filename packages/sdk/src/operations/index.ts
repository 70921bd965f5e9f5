/**
 * Operations module - field operations and the rules for combining them
 * @module operations
 *
 * Local edits to an object's fields are recorded as operations rather than
 * values, so they can be composed offline and replayed by the server against
 * whatever the field holds by then.
 */

export * from './field-operations.js';
export * from './equality.js';
export { encodeOperation, decodeOperation } from './codec.js';
export { PendingOperationSet } from './pending.js';
