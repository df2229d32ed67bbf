import { err, ok, type Result } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { CacheStorage } from '../cache-storage.js';
import { MemoryStorage, type Storage, type StorageEntry } from '../storage.js';

describe('MemoryStorage', () => {
  it('returns undefined for missing keys', async () => {
    const storage = new MemoryStorage();
    expect((await storage.get('denom'))._unsafeUnwrap()).toBeUndefined();
  });

  it('stores and overwrites values', async () => {
    const storage = new MemoryStorage({ denom: '"a"' });
    await storage.set('denom', '"b"');
    await storage.setMany([{ key: 'ownership', value: '{}' }]);

    expect(storage.snapshot()).toEqual({ denom: '"b"', ownership: '{}' });
  });
});

describe('CacheStorage', () => {
  it('serves pending writes before the inner storage', async () => {
    const inner = new MemoryStorage({ denom: '"old"' });
    const cache = new CacheStorage(inner);

    await cache.set('denom', '"new"');

    expect((await cache.get('denom'))._unsafeUnwrap()).toBe('"new"');
    expect((await inner.get('denom'))._unsafeUnwrap()).toBe('"old"');
  });

  it('falls through to the inner storage for untouched keys', async () => {
    const cache = new CacheStorage(new MemoryStorage({ ownership: '{"owner":"core1owner"}' }));
    expect((await cache.get('ownership'))._unsafeUnwrap()).toBe('{"owner":"core1owner"}');
  });

  it('flushes every pending write in one batch on commit', async () => {
    const inner = new MemoryStorage();
    const setMany = vi.spyOn(inner, 'setMany');
    const cache = new CacheStorage(inner);

    await cache.set('denom', '"uabc-contractx"');
    await cache.setMany([{ key: 'ownership', value: '{}' }]);
    expect(cache.pendingWrites).toBe(2);

    const result = await cache.commit();

    expect(result.isOk()).toBe(true);
    expect(setMany).toHaveBeenCalledOnce();
    expect(inner.snapshot()).toEqual({ denom: '"uabc-contractx"', ownership: '{}' });
    expect(cache.pendingWrites).toBe(0);
  });

  it('skips the inner storage when nothing is pending', async () => {
    const inner = new MemoryStorage();
    const setMany = vi.spyOn(inner, 'setMany');

    await new CacheStorage(inner).commit();

    expect(setMany).not.toHaveBeenCalled();
  });

  it('leaves the inner storage untouched when discarded', async () => {
    const inner = new MemoryStorage();
    const cache = new CacheStorage(inner);

    await cache.set('denom', '"uabc-contractx"');
    cache.discard();
    await cache.commit();

    expect(inner.snapshot()).toEqual({});
  });

  it('keeps pending writes when the inner storage rejects the batch', async () => {
    const failing: Storage = {
      get: () => Promise.resolve(ok(undefined)),
      set: () => Promise.resolve(ok(undefined)),
      setMany: (_entries: readonly StorageEntry[]): Promise<Result<void, Error>> =>
        Promise.resolve(err(new Error('disk full'))),
    };
    const cache = new CacheStorage(failing);
    await cache.set('denom', '"x"');

    const result = await cache.commit();

    expect(result._unsafeUnwrapErr().message).toBe('disk full');
    expect(cache.pendingWrites).toBe(1);
  });
});
