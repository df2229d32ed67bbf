import { parseWithSchema, ValidationError } from '@ftgate/core';
import type { Storage } from '@ftgate/storage';
import { err, type Result } from 'neverthrow';

import { execute, instantiate, query, type QueryResponse } from './contract.js';
import { executeInvocation } from './invocation.js';
import { ExecuteMsgSchema, InstantiateMsgSchema, QueryMsgSchema } from './msg.js';
import type { Querier } from './querier.js';
import { DEFAULT_MAX_QUERY_PAGES, type ContractResponse, type Deps, type Env } from './types.js';

export interface ContractHostOptions {
  address: string;
  storage: Storage;
  querier: Querier;
  maxQueryPages?: number | undefined;
}

/**
 * Entry-point plumbing for one contract instance: validates raw messages and
 * runs each mutating call atomically against the instance's storage.
 */
export class ContractHost {
  private readonly env: Env;
  private readonly maxQueryPages: number;

  /**
   * @throws ValidationError when `maxQueryPages` is not a positive integer
   */
  constructor(private readonly options: ContractHostOptions) {
    const maxQueryPages = options.maxQueryPages ?? DEFAULT_MAX_QUERY_PAGES;
    if (!Number.isInteger(maxQueryPages) || maxQueryPages < 1) {
      throw new ValidationError([{ message: 'Must be a positive integer', path: 'maxQueryPages' }]);
    }
    this.env = { contract: { address: options.address } };
    this.maxQueryPages = maxQueryPages;
  }

  instantiate(sender: string, rawMsg: unknown): Promise<Result<ContractResponse, Error>> {
    const msg = parseWithSchema(InstantiateMsgSchema, rawMsg, 'instantiate');
    if (msg.isErr()) {
      return Promise.resolve(err(msg.error));
    }
    const parsed = msg.value;
    return executeInvocation(this.options.storage, (storage) =>
      instantiate(this.depsFor(storage), this.env, { sender }, parsed)
    );
  }

  execute(sender: string, rawMsg: unknown): Promise<Result<ContractResponse, Error>> {
    const msg = parseWithSchema(ExecuteMsgSchema, rawMsg, 'execute');
    if (msg.isErr()) {
      return Promise.resolve(err(msg.error));
    }
    const parsed = msg.value;
    return executeInvocation(this.options.storage, (storage) =>
      execute(this.depsFor(storage), this.env, { sender }, parsed)
    );
  }

  query(rawMsg: unknown): Promise<Result<QueryResponse, Error>> {
    const msg = parseWithSchema(QueryMsgSchema, rawMsg, 'query');
    if (msg.isErr()) {
      return Promise.resolve(err(msg.error));
    }
    return query(this.depsFor(this.options.storage), this.env, msg.value);
  }

  private depsFor(storage: Storage): Deps {
    return { maxQueryPages: this.maxQueryPages, querier: this.options.querier, storage };
  }
}
