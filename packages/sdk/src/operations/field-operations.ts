/**
 * Field operations and the rules for combining them
 * @module operations/field-operations
 */

import { ErrorCode, InvalidOperationError, ObjectStoreError } from '../errors/index.js';
import { frozenCopy, isJsonObject, type JsonValue } from '../types.js';
import {
  addUniqueItems,
  distinct,
  sameObject,
  toPointer,
  valuesEqual,
  type ObjectReference,
  type Pointer,
} from './equality.js';

export interface SetOperation {
  readonly kind: 'Set';
  readonly value: JsonValue;
}

export interface DeleteOperation {
  readonly kind: 'Delete';
}

export interface IncrementOperation {
  readonly kind: 'Increment';
  readonly amount: number;
}

export interface AddOperation {
  readonly kind: 'Add';
  readonly items: readonly JsonValue[];
}

export interface AddUniqueOperation {
  readonly kind: 'AddUnique';
  readonly items: readonly JsonValue[];
}

export interface RemoveOperation {
  readonly kind: 'Remove';
  readonly items: readonly JsonValue[];
}

export interface RelationOperation {
  readonly kind: 'Relation';
  readonly targetClassName: string;
  readonly adds: readonly Pointer[];
  readonly removes: readonly Pointer[];
}

/**
 * A pending edit to one field
 */
export type FieldOperation =
  | SetOperation
  | DeleteOperation
  | IncrementOperation
  | AddOperation
  | AddUniqueOperation
  | RemoveOperation
  | RelationOperation;

export type FieldOperationKind = FieldOperation['kind'];

function freezeItems<T>(items: readonly T[]): readonly T[] {
  return frozenCopy([...items]);
}

/**
 * Replace the field's value. The operation keeps a frozen copy, so later
 * changes to `value` do not reach it.
 */
export function set(value: JsonValue): SetOperation {
  return Object.freeze({ kind: 'Set', value: frozenCopy(value) });
}

/**
 * Delete the field (`delete` is reserved)
 */
export function del(): DeleteOperation {
  return Object.freeze({ kind: 'Delete' });
}

export function increment(amount = 1): IncrementOperation {
  if (!Number.isFinite(amount)) {
    throw new InvalidOperationError(`Cannot increment by ${amount}.`);
  }
  return Object.freeze({ kind: 'Increment', amount });
}

export function add(items: readonly JsonValue[]): AddOperation {
  return Object.freeze({ kind: 'Add', items: freezeItems(distinct(items)) });
}

export function addUnique(items: readonly JsonValue[]): AddUniqueOperation {
  return Object.freeze({ kind: 'AddUnique', items: freezeItems(addUniqueItems([], items)) });
}

export function remove(items: readonly JsonValue[]): RemoveOperation {
  return Object.freeze({ kind: 'Remove', items: freezeItems(distinct(items)) });
}

function uniqueReferences(references: readonly ObjectReference[]): Pointer[] {
  const result: Pointer[] = [];
  for (const reference of references) {
    if (!result.some((existing) => sameObject(existing, reference))) {
      result.push(toPointer(reference));
    }
  }
  return result;
}

/**
 * Change membership of a relation field. An object listed in both sets
 * ends up only in `removes`.
 *
 * @throws InvalidOperationError when an object is not of the target class
 */
export function relation(
  targetClassName: string,
  adds: readonly ObjectReference[],
  removes: readonly ObjectReference[] = []
): RelationOperation {
  for (const reference of [...adds, ...removes]) {
    if (reference.className !== targetClassName) {
      throw new InvalidOperationError(
        `Relation on ${targetClassName} cannot contain objects of class ${reference.className}.`
      );
    }
  }

  const removed = uniqueReferences(removes);
  const added = uniqueReferences(adds).filter(
    (pointer) => !removed.some((other) => sameObject(other, pointer))
  );

  return Object.freeze({
    kind: 'Relation',
    targetClassName,
    adds: freezeItems(added),
    removes: freezeItems(removed),
  });
}

export function addRelation(
  targetClassName: string,
  objects: readonly ObjectReference[]
): RelationOperation {
  return relation(targetClassName, objects, []);
}

export function removeRelation(
  targetClassName: string,
  objects: readonly ObjectReference[]
): RelationOperation {
  return relation(targetClassName, [], objects);
}

type ValueOperation =
  | IncrementOperation
  | AddOperation
  | AddUniqueOperation
  | RemoveOperation;

function incorrectType(message: string): ObjectStoreError {
  return new ObjectStoreError(ErrorCode.IncorrectType, message);
}

function asList(oldValue: JsonValue | undefined, kind: FieldOperationKind): readonly JsonValue[] {
  if (oldValue === undefined) {
    return [];
  }
  if (!Array.isArray(oldValue)) {
    throw incorrectType(`${kind} can only be applied to a list.`);
  }
  return oldValue;
}

function applyValueOperation(oldValue: JsonValue | undefined, operation: ValueOperation): JsonValue {
  switch (operation.kind) {
    case 'Increment': {
      if (oldValue === undefined) {
        return operation.amount;
      }
      if (typeof oldValue !== 'number') {
        throw incorrectType('Cannot increment a non-number value.');
      }
      return oldValue + operation.amount;
    }
    case 'Add':
      return [...asList(oldValue, operation.kind), ...operation.items];
    case 'AddUnique':
      return addUniqueItems(asList(oldValue, operation.kind), operation.items);
    case 'Remove':
      return asList(oldValue, operation.kind).filter(
        (existing) => !operation.items.some((item) => valuesEqual(existing, item))
      );
  }
}

/**
 * Compute the value a field holds once the operation has been applied on
 * top of `oldValue` (`undefined` when the field is absent or deleted).
 *
 * @throws ObjectStoreError with {@link ErrorCode.IncorrectType} when the
 * old value has the wrong shape for the operation
 */
export function apply(
  oldValue: JsonValue | undefined,
  operation: FieldOperation
): JsonValue | undefined {
  switch (operation.kind) {
    case 'Set':
      return operation.value;
    case 'Delete':
      return undefined;
    case 'Relation': {
      if (oldValue === undefined) {
        return { __type: 'Relation', className: operation.targetClassName };
      }
      if (
        !isJsonObject(oldValue) ||
        oldValue.__type !== 'Relation' ||
        oldValue.className !== operation.targetClassName
      ) {
        throw incorrectType(`Field is not a relation on ${operation.targetClassName}.`);
      }
      return oldValue;
    }
    default:
      return applyValueOperation(oldValue, operation);
  }
}

function invalidTransition(previous: FieldOperation, incoming: FieldOperation): InvalidOperationError {
  return new InvalidOperationError(
    `${incoming.kind} is invalid after previous operation ${previous.kind}.`
  );
}

function mergeRelations(previous: RelationOperation, incoming: RelationOperation): RelationOperation {
  if (previous.targetClassName !== incoming.targetClassName) {
    throw new InvalidOperationError(
      `Relation on ${incoming.targetClassName} cannot follow a relation on ${previous.targetClassName}.`
    );
  }

  const notIn = (pointers: readonly Pointer[]) => (pointer: Pointer) =>
    !pointers.some((other) => sameObject(other, pointer));

  const adds = [...previous.adds.filter(notIn(incoming.removes)), ...incoming.adds];
  const removes = [...previous.removes.filter(notIn(incoming.adds)), ...incoming.removes];

  return relation(incoming.targetClassName, adds, removes);
}

/**
 * Combine an operation with the one already pending for the same field,
 * producing a single operation with the same net effect.
 *
 * @param previous - Operation already pending, if any
 * @param incoming - New local edit
 * @throws InvalidOperationError when the two cannot be combined
 */
export function merge(previous: FieldOperation | undefined, incoming: FieldOperation): FieldOperation {
  if (previous === undefined) {
    return incoming;
  }

  switch (incoming.kind) {
    case 'Set':
    case 'Delete':
      return incoming;

    case 'Relation':
      if (previous.kind !== 'Relation') {
        throw invalidTransition(previous, incoming);
      }
      return mergeRelations(previous, incoming);

    default:
      break;
  }

  switch (previous.kind) {
    case 'Delete':
      switch (incoming.kind) {
        case 'Increment':
          return set(incoming.amount);
        case 'Add':
        case 'AddUnique':
          return set([...incoming.items]);
        case 'Remove':
          return previous;
      }
      break;

    case 'Set':
      return set(applyValueOperation(previous.value, incoming));

    case 'Increment':
      if (incoming.kind === 'Increment') {
        return increment(previous.amount + incoming.amount);
      }
      break;

    case 'Add':
      if (incoming.kind === 'Add') {
        return add([...previous.items, ...incoming.items]);
      }
      break;

    case 'AddUnique':
      if (incoming.kind === 'AddUnique') {
        return addUnique(addUniqueItems(previous.items, incoming.items));
      }
      break;

    case 'Remove':
      if (incoming.kind === 'Remove') {
        return remove([...previous.items, ...incoming.items]);
      }
      break;

    case 'Relation':
      break;
  }

  throw invalidTransition(previous, incoming);
}
