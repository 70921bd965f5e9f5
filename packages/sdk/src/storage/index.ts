/**
 * Storage module - persistent key/value capability used by the SDK
 * @module storage
 */

import type { JsonValue } from '../types.js';

/**
 * Snapshot of the persisted key/value collection.
 *
 * Reads are served from the snapshot taken by {@link StorageController.load};
 * writes are persisted before the returned promise settles.
 */
export interface StorageDictionary {
  tryGet(key: string): JsonValue | undefined;
  add(key: string, value: JsonValue): Promise<void>;
  remove(key: string): Promise<void>;
  readonly size: number;
}

/**
 * Long-lived owner of the persisted key/value data
 */
export interface StorageController {
  load(): Promise<StorageDictionary>;
}

/**
 * Dictionary view over a plain Map
 */
class MapStorageDictionary implements StorageDictionary {
  constructor(private readonly entries: Map<string, JsonValue>) {}

  tryGet(key: string): JsonValue | undefined {
    return this.entries.get(key);
  }

  add(key: string, value: JsonValue): Promise<void> {
    this.entries.set(key, value);
    return Promise.resolve();
  }

  remove(key: string): Promise<void> {
    this.entries.delete(key);
    return Promise.resolve();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * In-process storage; used in tests and where nothing should outlive the process
 */
export class MemoryStorageController implements StorageController {
  private readonly entries = new Map<string, JsonValue>();
  private readonly dictionary = new MapStorageDictionary(this.entries);

  constructor(initial: Record<string, JsonValue> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.entries.set(key, value);
    }
  }

  load(): Promise<StorageDictionary> {
    return Promise.resolve(this.dictionary);
  }
}

export {
  RxStorageController,
  createRxStorage,
  storageEntrySchema,
  type StorageEntry,
  type StorageEntryCollection,
  type StorageEntryDocument,
  type RxStorage,
  type RxStorageOptions,
} from './rxdb.js';
