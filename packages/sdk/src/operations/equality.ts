/**
 * Value equality used by list operations
 * @module operations/equality
 *
 * References to stored objects (pointers and full object payloads) are equal
 * when they name the same object; everything else compares structurally.
 */

import { isDeepStrictEqual } from 'node:util';
import { isJsonObject, type JsonValue } from '../types.js';

/**
 * Encoded reference to a stored object
 */
export type Pointer = {
  __type: 'Pointer';
  className: string;
  objectId: string;
};

/**
 * Anything that names a stored object
 */
export interface ObjectReference {
  className: string;
  objectId: string;
}

/**
 * Check whether a value references a stored object, either as a pointer or
 * as a full `{ __type: 'Object' }` payload carrying an object id
 */
export function isObjectReference(value: unknown): value is ObjectReference & Record<string, unknown> {
  if (!isJsonObject(value)) {
    return false;
  }

  const type = value.__type;
  return (
    (type === 'Pointer' || type === 'Object') &&
    typeof value.className === 'string' &&
    typeof value.objectId === 'string'
  );
}

/**
 * Build a pointer to the referenced object
 */
export function toPointer(reference: ObjectReference): Pointer {
  return {
    __type: 'Pointer',
    className: reference.className,
    objectId: reference.objectId,
  };
}

/**
 * Whether two references name the same stored object
 */
export function sameObject(a: ObjectReference, b: ObjectReference): boolean {
  return a.className === b.className && a.objectId === b.objectId;
}

/**
 * Field value equality
 */
export function valuesEqual(a: JsonValue, b: JsonValue): boolean {
  const aIsReference = isObjectReference(a);
  const bIsReference = isObjectReference(b);

  if (aIsReference && bIsReference) {
    return sameObject(a, b);
  }

  if (aIsReference || bIsReference) {
    return false;
  }

  return isDeepStrictEqual(a, b);
}

/**
 * Drop later duplicates, keeping first occurrences in order
 */
export function distinct(items: readonly JsonValue[]): JsonValue[] {
  const result: JsonValue[] = [];

  for (const item of items) {
    if (!result.some((existing) => valuesEqual(existing, item))) {
      result.push(item);
    }
  }

  return result;
}

/**
 * Add items to a list unless already present. A reference matching an
 * existing member replaces that member in place; other values already in
 * the list are skipped.
 */
export function addUniqueItems(
  list: readonly JsonValue[],
  items: readonly JsonValue[]
): JsonValue[] {
  const result = [...list];

  for (const item of items) {
    const index = result.findIndex((existing) => valuesEqual(existing, item));

    if (index === -1) {
      result.push(item);
    } else if (isObjectReference(item)) {
      result[index] = item;
    }
  }

  return result;
}
