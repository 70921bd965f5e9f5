/**
 * Objects module - stored objects and their fetch/save/destroy lifecycle
 * @module objects
 */

import { Command } from '../command/index.js';
import { ErrorCode, InvalidOperationError, ObjectStoreError } from '../errors/index.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';
import {
  PendingOperationSet,
  add,
  addRelation,
  addUnique,
  apply,
  del,
  increment,
  merge,
  remove,
  removeRelation,
  set,
  type FieldOperation,
  type ObjectReference,
  type Pointer,
} from '../operations/index.js';
import type { CommandRunner, RunOptions } from '../runner/index.js';
import type { JsonObject, JsonValue } from '../types.js';

/**
 * Fields maintained by the server; they cannot be edited locally
 */
export const RESERVED_FIELDS: ReadonlySet<string> = new Set(['objectId', 'createdAt', 'updatedAt']);

const CLASS_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function assertClassName(className: string): void {
  if (!CLASS_NAME_PATTERN.test(className)) {
    throw new ObjectStoreError(ErrorCode.InvalidClassName, `Invalid class name: ${className}`);
  }
}

/**
 * A record of one class on the object store: the last known server state
 * plus the operations queued locally since.
 *
 * @example
 * ```typescript
 * const todo = new StoredObject('Todo', { text: 'write tests', done: false });
 * todo.increment('views');
 * todo.addUnique('tags', ['sdk']);
 *
 * todo.get('views'); // 1
 * todo.isDirty;      // true
 * ```
 */
export class StoredObject {
  readonly className: string;
  readonly pending = new PendingOperationSet();
  private id?: string;
  private serverData: JsonObject = {};
  /** Edits sent by the save currently running, if any */
  private inFlight?: PendingOperationSet;

  constructor(className: string, attributes: JsonObject = {}, objectId?: string) {
    assertClassName(className);
    this.className = className;
    this.id = objectId;

    for (const [field, value] of Object.entries(attributes)) {
      this.set(field, value);
    }
  }

  /**
   * Reference an existing object without any of its data
   */
  static withoutData(className: string, objectId: string): StoredObject {
    return new StoredObject(className, {}, objectId);
  }

  get objectId(): string | undefined {
    return this.id;
  }

  /**
   * Whether the object has local edits or has never been saved
   */
  get isDirty(): boolean {
    return this.id === undefined || !this.pending.isEmpty;
  }

  /**
   * Whether a save of this object is running
   */
  get isSaving(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * Current value of a field, in-flight and pending edits included
   */
  get(field: string): JsonValue | undefined {
    if (field === 'objectId') {
      return this.id;
    }

    let value: JsonValue | undefined = this.serverData[field];
    for (const operations of this.layers()) {
      const operation = operations.get(field);
      if (operation) {
        value = apply(value, operation);
      }
    }
    return value;
  }

  /**
   * Every field as it will be once the pending edits are saved
   */
  get attributes(): JsonObject {
    return this.layers().reduce(
      (estimate, operations) => operations.estimate(estimate),
      this.serverData
    );
  }

  has(field: string): boolean {
    return this.get(field) !== undefined;
  }

  set(field: string, value: JsonValue): this {
    return this.perform(field, set(value));
  }

  unset(field: string): this {
    return this.perform(field, del());
  }

  increment(field: string, amount = 1): this {
    return this.perform(field, increment(amount));
  }

  add(field: string, items: readonly JsonValue[]): this {
    return this.perform(field, add(items));
  }

  addUnique(field: string, items: readonly JsonValue[]): this {
    return this.perform(field, addUnique(items));
  }

  remove(field: string, items: readonly JsonValue[]): this {
    return this.perform(field, remove(items));
  }

  addRelation(field: string, objects: readonly ObjectReference[]): this {
    return this.perform(field, addRelation(relationClass(objects), objects));
  }

  removeRelation(field: string, objects: readonly ObjectReference[]): this {
    return this.perform(field, removeRelation(relationClass(objects), objects));
  }

  /**
   * Queue an operation on a field
   *
   * @throws InvalidOperationError for server-maintained fields and invalid merges
   * @throws ObjectStoreError with {@link ErrorCode.IncorrectType} when the
   * field's current value cannot take the operation
   */
  perform(field: string, operation: FieldOperation): this {
    if (RESERVED_FIELDS.has(field)) {
      throw new InvalidOperationError(`Field ${field} is maintained by the server.`);
    }

    // Both checks throw before anything is queued
    apply(this.get(field), operation);
    const queued = merge(this.pending.get(field), operation);
    const sent = this.inFlight?.get(field);
    if (sent) {
      merge(sent, queued);
    }

    this.pending.perform(field, operation);
    return this;
  }

  /**
   * Discard every pending edit; edits of a running save are not affected
   */
  revert(): void {
    this.pending.clear();
  }

  /**
   * Pointer to this object
   *
   * @throws InvalidOperationError when the object has not been saved yet
   */
  toPointer(): Pointer {
    if (this.id === undefined) {
      throw new InvalidOperationError(`Cannot point to an unsaved ${this.className}.`);
    }
    return { __type: 'Pointer', className: this.className, objectId: this.id };
  }

  /**
   * Replace the server state with a fetched copy; pending edits are kept
   * @internal
   */
  acceptFetched(data: JsonObject): void {
    this.serverData = {};
    this.mergeServerData(data);
  }

  /**
   * Take the pending edits out for a save
   * @internal
   */
  beginSave(): PendingOperationSet {
    if (this.inFlight) {
      throw new InvalidOperationError(`A save of this ${this.className} is already running.`);
    }
    this.inFlight = this.pending.detach();
    return this.inFlight;
  }

  /**
   * Fold a successful save into the server state
   * @internal
   */
  completeSave(inFlight: PendingOperationSet, response: JsonObject): void {
    this.serverData = inFlight.estimate(this.serverData);
    this.inFlight = undefined;
    this.mergeServerData(response);
  }

  /**
   * Put the edits of a failed save back underneath newer ones
   * @internal
   */
  abortSave(inFlight: PendingOperationSet): void {
    // A pair that cannot be combined keeps its net effect as a plain value
    this.pending.restore(inFlight, (field) => {
      const value = this.get(field);
      return value === undefined ? del() : set(value);
    });
    this.inFlight = undefined;
  }

  private layers(): PendingOperationSet[] {
    return this.inFlight ? [this.inFlight, this.pending] : [this.pending];
  }

  private mergeServerData(data: JsonObject): void {
    for (const [field, value] of Object.entries(data)) {
      if (field === 'objectId') {
        if (typeof value === 'string') {
          this.id = value;
        }
        continue;
      }
      this.serverData[field] = value;
    }
  }
}

function relationClass(objects: readonly ObjectReference[]): string {
  const first = objects[0];
  if (!first) {
    throw new InvalidOperationError('A relation change needs at least one object.');
  }
  return first.className;
}

/**
 * Options for object requests
 */
export interface ObjectRequestOptions extends RunOptions {
  sessionToken?: string | null;
}

/**
 * Configuration for the object controller
 */
export interface ObjectControllerConfig {
  serverUrl: string;
  logger?: Logger;
}

/**
 * Object controller - issues the commands that read and write stored objects
 */
export class ObjectController {
  private readonly serverUrl: string;
  private readonly log: Logger;
  private readonly saves = new WeakMap<StoredObject, Promise<StoredObject>>();

  constructor(
    private readonly runner: CommandRunner,
    config: ObjectControllerConfig
  ) {
    this.serverUrl = config.serverUrl;
    this.log = (config.logger ?? rootLogger).child({ module: 'objects' });
  }

  /**
   * Refresh an object from the server
   *
   * @throws InvalidOperationError when the object has never been saved
   */
  async fetch(object: StoredObject, options: ObjectRequestOptions = {}): Promise<StoredObject> {
    const objectId = requireObjectId(object, 'fetch');
    const { sessionToken, ...runOptions } = options;

    const result = await this.runner.run(
      new Command({
        endpoint: `classes/${object.className}/${encodeURIComponent(objectId)}`,
        method: 'GET',
        sessionToken,
        serverUrl: this.serverUrl,
      }),
      runOptions
    );

    object.acceptFetched(result.data);
    return object;
  }

  /**
   * Load an object by class and id
   */
  get(className: string, objectId: string, options: ObjectRequestOptions = {}): Promise<StoredObject> {
    return this.fetch(StoredObject.withoutData(className, objectId), options);
  }

  /**
   * Send the pending edits: a create for new objects, an update otherwise.
   * Edits made while the save is in flight stay pending either way. Saves
   * of one object run one after another, each sending what is pending when
   * it starts.
   */
  save(object: StoredObject, options: ObjectRequestOptions = {}): Promise<StoredObject> {
    const previous = this.saves.get(object);
    // A failed earlier save has already rejected for its own caller
    const save = previous
      ? previous.catch(() => object).then(() => this.send(object, options))
      : this.send(object, options);
    this.saves.set(object, save);

    return save.finally(() => {
      if (this.saves.get(object) === save) {
        this.saves.delete(object);
      }
    });
  }

  private async send(object: StoredObject, options: ObjectRequestOptions): Promise<StoredObject> {
    if (!object.isDirty) {
      return object;
    }

    const { sessionToken, ...runOptions } = options;
    const objectId = object.objectId;
    const inFlight = object.beginSave();

    const command = new Command({
      endpoint:
        objectId === undefined
          ? `classes/${object.className}`
          : `classes/${object.className}/${encodeURIComponent(objectId)}`,
      method: objectId === undefined ? 'POST' : 'PUT',
      sessionToken,
      body: inFlight.encode(),
      serverUrl: this.serverUrl,
    });

    try {
      const result = await this.runner.run(command, runOptions);
      object.completeSave(inFlight, result.data);
    } catch (error) {
      object.abortSave(inFlight);
      this.log.debug(
        { className: object.className, objectId, fields: inFlight.fields },
        'Save failed, pending edits restored'
      );
      throw error;
    }

    return object;
  }

  /**
   * Delete an object on the server
   *
   * @throws InvalidOperationError when the object has never been saved
   */
  async destroy(object: StoredObject, options: ObjectRequestOptions = {}): Promise<void> {
    const objectId = requireObjectId(object, 'destroy');
    const { sessionToken, ...runOptions } = options;

    await this.runner.run(
      new Command({
        endpoint: `classes/${object.className}/${encodeURIComponent(objectId)}`,
        method: 'DELETE',
        sessionToken,
        serverUrl: this.serverUrl,
      }),
      runOptions
    );
  }
}

function requireObjectId(object: StoredObject, action: string): string {
  const objectId = object.objectId;
  if (objectId === undefined) {
    throw new InvalidOperationError(`Cannot ${action} an unsaved ${object.className}.`);
  }
  return objectId;
}
