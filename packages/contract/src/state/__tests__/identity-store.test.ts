import { AlreadyInitializedError, NotFoundError, ValidationError } from '@ftgate/core';
import { MemoryStorage } from '@ftgate/storage';
import { describe, expect, it } from 'vitest';

import { deriveDenom, IdentityStore } from '../identity-store.js';

describe('deriveDenom', () => {
  it('joins subunit and contract address in lower case', () => {
    expect(deriveDenom('uABC', 'core1ContractX')).toBe('uabc-core1contractx');
  });
});

describe('IdentityStore', () => {
  it('saves the denomination once and loads it back', async () => {
    const storage = new MemoryStorage();
    const store = new IdentityStore(storage);

    (await store.save('uabc-contractx'))._unsafeUnwrap();

    expect((await store.load())._unsafeUnwrap()).toBe('uabc-contractx');
    expect(storage.snapshot()).toEqual({ denom: '"uabc-contractx"' });
  });

  it('refuses to overwrite an existing denomination', async () => {
    const storage = new MemoryStorage({ denom: '"uabc-contractx"' });
    const store = new IdentityStore(storage);

    const error = (await store.save('uother-contractx'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(AlreadyInitializedError);
    expect((await store.load())._unsafeUnwrap()).toBe('uabc-contractx');
  });

  it('fails with NotFound when nothing was saved', async () => {
    const error = (await new IdentityStore(new MemoryStorage()).load())._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('No value stored under "denom"');
  });

  it('reports corrupt stored values', async () => {
    const notJson = (await new IdentityStore(new MemoryStorage({ denom: 'uabc' })).load())._unsafeUnwrapErr();
    expect(notJson.message).toMatch(/^Stored value under "denom" is not valid JSON: /);

    const wrongType = (await new IdentityStore(new MemoryStorage({ denom: '42' })).load())._unsafeUnwrapErr();
    expect(wrongType).toBeInstanceOf(ValidationError);
  });
});
