import { NotFoundError, parseWithSchema, wrapError } from '@ftgate/core';
import type { Storage } from '@ftgate/storage';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

/**
 * A single typed, JSON-encoded storage slot.
 */
export class Item<T> {
  constructor(
    readonly key: string,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>
  ) {}

  async mayLoad(storage: Storage): Promise<Result<T | undefined, Error>> {
    const raw = await storage.get(this.key);
    if (raw.isErr()) {
      return err(raw.error);
    }
    if (raw.value === undefined) {
      return ok(undefined);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw.value);
    } catch (error) {
      return wrapError(error, `Stored value under "${this.key}" is not valid JSON`);
    }
    return parseWithSchema(this.schema, decoded, `load ${this.key}`);
  }

  async load(storage: Storage): Promise<Result<T, Error>> {
    const loaded = await this.mayLoad(storage);
    if (loaded.isErr()) {
      return err(loaded.error);
    }
    if (loaded.value === undefined) {
      return err(new NotFoundError(this.key));
    }
    return ok(loaded.value);
  }

  save(storage: Storage, value: T): Promise<Result<void, Error>> {
    return storage.set(this.key, JSON.stringify(value));
  }
}
