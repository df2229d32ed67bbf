import { ok, type Result } from 'neverthrow';

export interface StorageEntry {
  key: string;
  value: string;
}

/**
 * Key-value substrate holding a contract's persisted state.
 * Values are opaque strings; typed access lives one layer up.
 */
export interface Storage {
  get(key: string): Promise<Result<string | undefined, Error>>;
  set(key: string, value: string): Promise<Result<void, Error>>;
  /** Write several entries atomically. */
  setMany(entries: readonly StorageEntry[]): Promise<Result<void, Error>>;
}

export class MemoryStorage implements Storage {
  private readonly values = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    for (const [key, value] of Object.entries(initial ?? {})) {
      this.values.set(key, value);
    }
  }

  get(key: string): Promise<Result<string | undefined, Error>> {
    return Promise.resolve(ok(this.values.get(key)));
  }

  set(key: string, value: string): Promise<Result<void, Error>> {
    this.values.set(key, value);
    return Promise.resolve(ok(undefined));
  }

  setMany(entries: readonly StorageEntry[]): Promise<Result<void, Error>> {
    for (const entry of entries) {
      this.values.set(entry.key, entry.value);
    }
    return Promise.resolve(ok(undefined));
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}
