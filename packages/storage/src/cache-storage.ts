import { getLogger } from '@ftgate/logger';
import { ok, type Result } from 'neverthrow';

import type { Storage, StorageEntry } from './storage.js';

const logger = getLogger('CacheStorage');

/**
 * Write-buffering overlay. Reads see pending writes first; nothing reaches the
 * inner storage until `commit()`, which flushes every pending write in one
 * `setMany` call. Dropping the overlay discards the writes.
 */
export class CacheStorage implements Storage {
  private readonly pending = new Map<string, string>();

  constructor(private readonly inner: Storage) {}

  async get(key: string): Promise<Result<string | undefined, Error>> {
    const buffered = this.pending.get(key);
    if (buffered !== undefined) {
      return ok(buffered);
    }
    return this.inner.get(key);
  }

  set(key: string, value: string): Promise<Result<void, Error>> {
    this.pending.set(key, value);
    return Promise.resolve(ok(undefined));
  }

  setMany(entries: readonly StorageEntry[]): Promise<Result<void, Error>> {
    for (const entry of entries) {
      this.pending.set(entry.key, entry.value);
    }
    return Promise.resolve(ok(undefined));
  }

  get pendingWrites(): number {
    return this.pending.size;
  }

  async commit(): Promise<Result<void, Error>> {
    if (this.pending.size === 0) {
      return ok(undefined);
    }

    const entries = [...this.pending].map(([key, value]) => ({ key, value }));
    const result = await this.inner.setMany(entries);
    if (result.isOk()) {
      logger.trace({ keys: entries.map((entry) => entry.key) }, 'Committed buffered writes');
      this.pending.clear();
    }
    return result;
  }

  discard(): void {
    this.pending.clear();
  }
}
