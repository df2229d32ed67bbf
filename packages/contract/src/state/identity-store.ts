import { AlreadyInitializedError } from '@ftgate/core';
import type { Storage } from '@ftgate/storage';
import { err, type Result } from 'neverthrow';
import { z } from 'zod';

import { Item } from './item.js';

const DENOM = new Item('denom', z.string().min(1));

/**
 * Derive the token denomination for a contract instance.
 */
export function deriveDenom(subunit: string, contractAddress: string): string {
  return `${subunit}-${contractAddress}`.toLowerCase();
}

/**
 * Holds the contract's denomination. Written once during instantiation and
 * never updated.
 */
export class IdentityStore {
  constructor(private readonly storage: Storage) {}

  async save(denom: string): Promise<Result<void, Error>> {
    const existing = await DENOM.mayLoad(this.storage);
    if (existing.isErr()) {
      return err(existing.error);
    }
    if (existing.value !== undefined) {
      return err(new AlreadyInitializedError(DENOM.key, { operation: 'identity.save' }));
    }
    return DENOM.save(this.storage, denom);
  }

  load(): Promise<Result<string, Error>> {
    return DENOM.load(this.storage);
  }
}
