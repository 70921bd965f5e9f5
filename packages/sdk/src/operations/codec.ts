/**
 * Wire format of field operations
 * @module operations/codec
 *
 * Operations travel as `{ "__op": <name>, ... }` objects inside a save
 * payload; a `Set` travels as the bare value.
 */

import { z } from 'zod';
import { ErrorCode, ObjectStoreError } from '../errors/index.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types.js';
import type { Pointer } from './equality.js';
import {
  add,
  addUnique,
  del,
  increment,
  relation,
  remove,
  set,
  type FieldOperation,
} from './field-operations.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const pointerSchema = z.object({
  __type: z.literal('Pointer'),
  className: z.string().min(1),
  objectId: z.string().min(1),
});

const addRelationSchema = z.object({
  __op: z.literal('AddRelation'),
  objects: z.array(pointerSchema),
});

const removeRelationSchema = z.object({
  __op: z.literal('RemoveRelation'),
  objects: z.array(pointerSchema),
});

const operationSchema = z.discriminatedUnion('__op', [
  z.object({ __op: z.literal('Delete') }),
  z.object({ __op: z.literal('Increment'), amount: z.number() }),
  z.object({ __op: z.literal('Add'), objects: z.array(jsonValueSchema) }),
  z.object({ __op: z.literal('AddUnique'), objects: z.array(jsonValueSchema) }),
  z.object({ __op: z.literal('Remove'), objects: z.array(jsonValueSchema) }),
  addRelationSchema,
  removeRelationSchema,
  z.object({
    __op: z.literal('Batch'),
    ops: z.array(z.union([addRelationSchema, removeRelationSchema])).min(1),
  }),
]);

type EncodedRelationChange = z.infer<typeof addRelationSchema> | z.infer<typeof removeRelationSchema>;

function relationChange(op: 'AddRelation' | 'RemoveRelation', objects: readonly Pointer[]): JsonObject {
  return { __op: op, objects: objects.map((pointer) => ({ ...pointer })) };
}

/**
 * Encode an operation for a save payload
 */
export function encodeOperation(operation: FieldOperation): JsonValue {
  switch (operation.kind) {
    case 'Set':
      return operation.value;
    case 'Delete':
      return { __op: 'Delete' };
    case 'Increment':
      return { __op: 'Increment', amount: operation.amount };
    case 'Add':
    case 'AddUnique':
    case 'Remove':
      return { __op: operation.kind, objects: [...operation.items] };
    case 'Relation': {
      if (operation.adds.length > 0 && operation.removes.length > 0) {
        return {
          __op: 'Batch',
          ops: [
            relationChange('AddRelation', operation.adds),
            relationChange('RemoveRelation', operation.removes),
          ],
        };
      }
      return operation.removes.length > 0
        ? relationChange('RemoveRelation', operation.removes)
        : relationChange('AddRelation', operation.adds);
    }
  }
}

function decodeRelation(changes: readonly EncodedRelationChange[]): FieldOperation {
  const adds: Pointer[] = [];
  const removes: Pointer[] = [];

  for (const change of changes) {
    (change.__op === 'AddRelation' ? adds : removes).push(...change.objects);
  }

  const first = adds[0] ?? removes[0];
  if (!first) {
    throw new ObjectStoreError(ErrorCode.InvalidJSON, 'Relation operation names no objects.');
  }

  const stray = [...adds, ...removes].find((pointer) => pointer.className !== first.className);
  if (stray) {
    throw new ObjectStoreError(
      ErrorCode.InvalidJSON,
      `Relation operation mixes classes ${first.className} and ${stray.className}.`
    );
  }

  return relation(first.className, adds, removes);
}

/**
 * Decode an operation from its wire form. Values that are not `__op`
 * objects decode to a `Set` of that value.
 *
 * @throws ObjectStoreError with {@link ErrorCode.InvalidJSON} for malformed operations
 */
export function decodeOperation(encoded: JsonValue): FieldOperation {
  if (!isJsonObject(encoded) || typeof encoded.__op !== 'string') {
    return set(encoded);
  }

  const parsed = operationSchema.safeParse(encoded);
  if (!parsed.success) {
    throw new ObjectStoreError(
      ErrorCode.InvalidJSON,
      `Malformed ${encoded.__op} operation: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      { cause: parsed.error }
    );
  }

  const operation = parsed.data;
  switch (operation.__op) {
    case 'Delete':
      return del();
    case 'Increment':
      return increment(operation.amount);
    case 'Add':
      return add(operation.objects);
    case 'AddUnique':
      return addUnique(operation.objects);
    case 'Remove':
      return remove(operation.objects);
    case 'AddRelation':
    case 'RemoveRelation':
      return decodeRelation([operation]);
    case 'Batch':
      return decodeRelation(operation.ops);
  }
}
