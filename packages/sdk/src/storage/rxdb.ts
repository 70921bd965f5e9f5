/**
 * RxDB-backed key/value storage
 * @module storage/rxdb
 */

import { randomUUID } from 'node:crypto';
import { createRxDatabase, type RxCollection, type RxJsonSchema } from 'rxdb';
import { getRxStorageMemory } from 'rxdb/plugins/storage-memory';
import { logger } from '../logger/index.js';
import { isJsonValue, type JsonValue } from '../types.js';
import type { StorageController, StorageDictionary } from './index.js';

const log = logger.child({ module: 'storage' });

/**
 * Persisted entry; values are stored JSON-encoded
 */
export interface StorageEntry {
  key: string;
  value: string;
}

/**
 * Key/value entry schema
 */
export const storageEntrySchema: RxJsonSchema<StorageEntry> = {
  title: 'storage_entry',
  version: 0,
  description: 'Key/value pair persisted by the SDK',
  type: 'object',
  primaryKey: 'key',
  properties: {
    key: {
      type: 'string',
      maxLength: 128,
    },
    value: {
      type: 'string',
    },
  },
  required: ['key', 'value'],
};

/**
 * The parts of an RxDocument the storage controller reads
 */
export interface StorageEntryDocument {
  readonly key: string;
  readonly value: string;
  remove(): Promise<unknown>;
}

/**
 * The parts of an RxCollection the storage controller uses;
 * satisfied by `RxCollection<StorageEntry>`.
 */
export interface StorageEntryCollection {
  find(): { exec(): Promise<StorageEntryDocument[]> };
  findOne(key: string): { exec(): Promise<StorageEntryDocument | null> };
  upsert(entry: StorageEntry): Promise<unknown>;
}

class RxStorageDictionary implements StorageDictionary {
  constructor(
    private readonly collection: StorageEntryCollection,
    private readonly snapshot: Map<string, JsonValue>
  ) {}

  tryGet(key: string): JsonValue | undefined {
    return this.snapshot.get(key);
  }

  async add(key: string, value: JsonValue): Promise<void> {
    await this.collection.upsert({ key, value: JSON.stringify(value) });
    this.snapshot.set(key, value);
  }

  async remove(key: string): Promise<void> {
    const doc = await this.collection.findOne(key).exec();
    if (doc) {
      await doc.remove();
    }
    this.snapshot.delete(key);
  }

  get size(): number {
    return this.snapshot.size;
  }
}

/**
 * Storage controller persisting entries in an RxDB collection
 */
export class RxStorageController implements StorageController {
  constructor(private readonly collection: StorageEntryCollection) {}

  async load(): Promise<StorageDictionary> {
    const docs = await this.collection.find().exec();
    const snapshot = new Map<string, JsonValue>();

    for (const doc of docs) {
      const value = decodeEntry(doc.value);
      if (value === undefined) {
        log.warn({ key: doc.key }, 'Skipping unreadable storage entry');
        continue;
      }
      snapshot.set(doc.key, value);
    }

    return new RxStorageDictionary(this.collection, snapshot);
  }
}

function decodeEntry(raw: string): JsonValue | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

type StorageCollections = {
  storage_entries: RxCollection<StorageEntry>;
};

/**
 * Options for {@link createRxStorage}
 */
export interface RxStorageOptions {
  /** Database name; a fresh one per call when omitted */
  name?: string;
}

/**
 * An opened RxDB storage and the means to close it
 */
export interface RxStorage {
  controller: RxStorageController;
  /** Destroy the database; the controller must not be used afterwards */
  close(): Promise<void>;
}

/**
 * Open an in-memory RxDB database holding the key/value collection.
 * Two open databases cannot share a name.
 *
 * @example
 * ```typescript
 * const storage = await createRxStorage();
 * const client = new ObjectStoreClient({ storage: storage.controller });
 * // ...
 * client.destroy();
 * await storage.close();
 * ```
 */
export async function createRxStorage(options: RxStorageOptions = {}): Promise<RxStorage> {
  const db = await createRxDatabase<StorageCollections>({
    name: options.name ?? `objectsync-${randomUUID()}`,
    storage: getRxStorageMemory(),
  });

  await db.addCollections({
    storage_entries: {
      schema: storageEntrySchema,
    },
  });

  return {
    controller: new RxStorageController(db.storage_entries),
    close: async () => {
      await db.destroy();
    },
  };
}
