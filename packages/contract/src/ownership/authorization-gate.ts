import { AlreadyInitializedError, NotFoundError, UnauthorizedError } from '@ftgate/core';
import { getLogger } from '@ftgate/logger';
import type { Storage } from '@ftgate/storage';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { Item } from '../state/item.js';

const OwnershipSchema = z.object({
  owner: z.string().min(1),
  pendingOwner: z.string().min(1).nullable(),
});

export type Ownership = z.infer<typeof OwnershipSchema>;

const OWNERSHIP = new Item('ownership', OwnershipSchema);

const logger = getLogger('AuthorizationGate');

/**
 * Single-controller authorization. Every mutating operation calls
 * `assertCallerIsController` before it builds anything.
 *
 * The controller can hand over the role in two steps: the controller names a
 * pending owner, then the pending owner accepts. There is always exactly one
 * controller.
 */
export class AuthorizationGate {
  constructor(private readonly storage: Storage) {}

  async initialize(controller: string): Promise<Result<Ownership, Error>> {
    const existing = await OWNERSHIP.mayLoad(this.storage);
    if (existing.isErr()) {
      return err(existing.error);
    }
    if (existing.value !== undefined) {
      return err(new AlreadyInitializedError(OWNERSHIP.key, { operation: 'gate.initialize' }));
    }

    const ownership: Ownership = { owner: controller, pendingOwner: null };
    return (await OWNERSHIP.save(this.storage, ownership)).map(() => ownership);
  }

  ownership(): Promise<Result<Ownership, Error>> {
    return OWNERSHIP.load(this.storage);
  }

  async assertCallerIsController(caller: string): Promise<Result<Ownership, Error>> {
    const ownership = await this.ownership();
    if (ownership.isErr()) {
      return err(ownership.error);
    }
    if (ownership.value.owner !== caller) {
      logger.warn({ caller }, 'Rejected caller that is not the controller');
      return err(new UnauthorizedError(caller, undefined, { operation: 'gate.assertCallerIsController' }));
    }
    return ok(ownership.value);
  }

  async transferOwnership(caller: string, newOwner: string): Promise<Result<Ownership, Error>> {
    const current = await this.assertCallerIsController(caller);
    if (current.isErr()) {
      return err(current.error);
    }

    const ownership: Ownership = { owner: current.value.owner, pendingOwner: newOwner };
    return (await OWNERSHIP.save(this.storage, ownership)).map(() => ownership);
  }

  async acceptOwnership(caller: string): Promise<Result<Ownership, Error>> {
    const current = await this.ownership();
    if (current.isErr()) {
      return err(current.error);
    }

    const { pendingOwner } = current.value;
    if (pendingOwner === null) {
      return err(new NotFoundError('pending_owner', 'No ownership transfer is pending'));
    }
    if (pendingOwner !== caller) {
      logger.warn({ caller }, 'Rejected caller that is not the pending owner');
      return err(new UnauthorizedError(caller, `Caller ${caller} is not the pending owner`));
    }

    const ownership: Ownership = { owner: caller, pendingOwner: null };
    return (await OWNERSHIP.save(this.storage, ownership)).map(() => ownership);
  }
}
