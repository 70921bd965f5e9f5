/**
 * Installation module - stable per-installation identifier
 * @module installation
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { InvalidOperationError } from '../errors/index.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';
import type { StorageController, StorageDictionary } from '../storage/index.js';

/**
 * Storage key the identifier is persisted under
 */
export const INSTALLATION_ID_KEY = 'InstallationId';

const installationIdSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.string().uuid());

/**
 * Validate a stored or caller supplied value as an installation id
 *
 * @returns The canonical lower-case form, or null when the value is not a UUID
 */
export function parseInstallationId(value: unknown): string | null {
  const parsed = installationIdSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Installation controller - resolves, caches and persists the installation id
 *
 * @example
 * ```typescript
 * const installation = new InstallationController(new MemoryStorageController());
 *
 * const id = await installation.get(); // minted and persisted on first use
 * await installation.clear();          // next get() mints a new one
 * ```
 */
export class InstallationController {
  private installationId: string | null = null;
  private resolving: Promise<string> | null = null;
  private generation = 0;
  private lastWrite: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(
    private readonly storage: StorageController,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ module: 'installation' });
  }

  /**
   * Get the installation id, loading or minting it on first use.
   * Concurrent calls on a cold cache share a single resolution, which reads
   * storage only after queued writes have settled.
   */
  get(): Promise<string> {
    if (this.installationId !== null) {
      return Promise.resolve(this.installationId);
    }

    if (!this.resolving) {
      const generation = this.generation;
      const resolving: Promise<string> = this.writesSettled()
        .then(() => this.resolve(generation))
        .finally(() => {
          if (this.resolving === resolving) {
            this.resolving = null;
          }
        });
      this.resolving = resolving;
    }

    return this.resolving;
  }

  /**
   * Replace the installation id, or remove it when given null. The cached id
   * changes only once storage holds the new value.
   *
   * @throws InvalidOperationError when the id is not a UUID
   */
  async set(installationId: string | null): Promise<void> {
    let next: string | null = null;

    if (installationId !== null) {
      next = parseInstallationId(installationId);
      if (next === null) {
        throw new InvalidOperationError(`Invalid installation id: ${installationId}`);
      }
    }

    const generation = ++this.generation;
    this.installationId = null;
    this.resolving = null;

    await this.persist(next);

    if (generation === this.generation) {
      this.installationId = next;
    }
  }

  /**
   * Forget the installation id; the next {@link get} mints a new one
   */
  clear(): Promise<void> {
    return this.set(null);
  }

  private async resolve(generation: number): Promise<string> {
    const storage = await this.storage.load();

    // A set() or clear() landed while storage was loading
    if (generation !== this.generation) {
      return this.get();
    }

    const stored = parseInstallationId(storage.tryGet(INSTALLATION_ID_KEY));
    if (stored !== null) {
      this.installationId = stored;
      return stored;
    }

    const minted = randomUUID();
    this.log.debug({ installationId: minted }, 'Minted installation id');
    await this.persist(minted, storage);

    if (generation === this.generation) {
      this.installationId = minted;
      return minted;
    }

    return this.installationId ?? minted;
  }

  /**
   * Queue a storage write behind the previous one so the last caller wins
   */
  private persist(installationId: string | null, loaded?: StorageDictionary): Promise<void> {
    const write = this.writesSettled().then(async () => {
      const storage = loaded ?? (await this.storage.load());
      if (installationId === null) {
        await storage.remove(INSTALLATION_ID_KEY);
      } else {
        await storage.add(INSTALLATION_ID_KEY, installationId);
      }
    });

    this.lastWrite = write;
    return write;
  }

  private writesSettled(): Promise<void> {
    // a failed write already reported its failure to its own caller
    return this.lastWrite.catch(() => undefined);
  }
}
