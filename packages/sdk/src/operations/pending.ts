/**
 * Net pending edits of one object
 * @module operations/pending
 */

import { ErrorCode, ObjectStoreError } from '../errors/index.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types.js';
import { decodeOperation, encodeOperation } from './codec.js';
import { apply, merge, type FieldOperation } from './field-operations.js';

/**
 * Per-field map of the operations queued since the last successful save.
 * A field holds at most one operation: each new edit is merged into it.
 *
 * @example
 * ```typescript
 * const pending = new PendingOperationSet();
 * pending.perform('tags', addUnique(['a', 'b']));
 * pending.perform('tags', addUnique(['b', 'c']));
 *
 * pending.get('tags');  // AddUnique(['a', 'b', 'c'])
 * pending.encode();     // { tags: { __op: 'AddUnique', objects: ['a', 'b', 'c'] } }
 * ```
 */
export class PendingOperationSet {
  private operations = new Map<string, FieldOperation>();

  /**
   * Record a local edit, merging it with the operation already queued for the field
   *
   * @returns The operation now queued for the field
   */
  perform(field: string, operation: FieldOperation): FieldOperation {
    const merged = merge(this.operations.get(field), operation);
    this.operations.set(field, merged);
    return merged;
  }

  get(field: string): FieldOperation | undefined {
    return this.operations.get(field);
  }

  has(field: string): boolean {
    return this.operations.has(field);
  }

  get fields(): string[] {
    return [...this.operations.keys()];
  }

  get size(): number {
    return this.operations.size;
  }

  get isEmpty(): boolean {
    return this.operations.size === 0;
  }

  clear(): void {
    this.operations.clear();
  }

  entries(): Iterable<[string, FieldOperation]> {
    return this.operations.entries();
  }

  /**
   * Field data as it will be once the pending operations are applied
   */
  estimate(serverData: JsonObject): JsonObject {
    const result: JsonObject = { ...serverData };

    for (const [field, operation] of this.operations) {
      const value = apply(result[field], operation);
      if (value === undefined) {
        delete result[field];
      } else {
        result[field] = value;
      }
    }

    return result;
  }

  /**
   * Save payload carrying every pending operation
   */
  encode(): JsonObject {
    const payload: JsonObject = {};
    for (const [field, operation] of this.operations) {
      payload[field] = encodeOperation(operation);
    }
    return payload;
  }

  /**
   * Rebuild a set from its encoded form
   *
   * @throws ObjectStoreError when the payload is not a mapping of operations
   */
  static decode(encoded: JsonValue): PendingOperationSet {
    if (!isJsonObject(encoded)) {
      throw new ObjectStoreError(ErrorCode.InvalidJSON, 'Pending operations must be a JSON object.');
    }

    const pending = new PendingOperationSet();
    for (const [field, value] of Object.entries(encoded)) {
      pending.operations.set(field, decodeOperation(value));
    }
    return pending;
  }

  /**
   * Take the current operations out for an in-flight save, leaving this set
   * empty to collect edits made while the save runs
   */
  detach(): PendingOperationSet {
    const inFlight = new PendingOperationSet();
    inFlight.operations = this.operations;
    this.operations = new Map();
    return inFlight;
  }

  /**
   * Put operations from a failed save back underneath the edits made since.
   * The set is only replaced once every field has been combined.
   *
   * @param resolve - Operation to keep for a field whose two operations
   * cannot be combined
   * @throws InvalidOperationError when a pair cannot be combined and there is
   * no `resolve`; neither set is changed
   */
  restore(inFlight: PendingOperationSet, resolve?: (field: string) => FieldOperation): void {
    const combined = new Map(inFlight.operations);

    for (const [field, operation] of this.operations) {
      let restored: FieldOperation;
      try {
        restored = merge(combined.get(field), operation);
      } catch (error) {
        if (!resolve) {
          throw error;
        }
        restored = resolve(field);
      }
      combined.set(field, restored);
    }

    this.operations = combined;
  }
}
