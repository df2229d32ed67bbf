import { coin } from '@ftgate/core';
import { getLogger } from '@ftgate/logger';
import type { Storage } from '@ftgate/storage';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { featureCode } from './assetft/features.js';
import type { AssetFtMsg, IssueMsg } from './assetft/messages.js';
import type { AssetFtQuery, PageRequest } from './assetft/queries.js';
import {
  BalanceResponseSchema,
  FrozenBalanceResponseSchema,
  FrozenBalancesResponseSchema,
  ParamsResponseSchema,
  TokenResponseSchema,
  TokensResponseSchema,
  WhitelistedBalanceResponseSchema,
  WhitelistedBalancesResponseSchema,
  type BalanceResponse,
  type FrozenBalanceResponse,
  type FrozenBalancesResponse,
  type PageResponse,
  type ParamsResponse,
  type TokenResponse,
  type TokensResponse,
  type WhitelistedBalanceResponse,
  type WhitelistedBalancesResponse,
} from './assetft/responses.js';
import type { ExecuteMsg, InstantiateMsg, OwnershipAction, QueryMsg } from './msg.js';
import { AuthorizationGate, type Ownership } from './ownership/authorization-gate.js';
import { collectAllPages, paginate, type CollectedPages } from './pagination/paginate.js';
import { queryAssetFt } from './querier.js';
import { getContractVersion, setContractVersion, type ContractVersion } from './state/contract-version.js';
import { deriveDenom, IdentityStore } from './state/identity-store.js';
import { attribute, type Attribute, type ContractResponse, type Deps, type Env, type MessageInfo } from './types.js';

const logger = getLogger('contract');

/**
 * Explicit state handles passed to every handler.
 */
interface Handles {
  gate: AuthorizationGate;
  identity: IdentityStore;
}

function handlesFor(storage: Storage): Handles {
  return { gate: new AuthorizationGate(storage), identity: new IdentityStore(storage) };
}

export type QueryResponse =
  | ParamsResponse
  | TokenResponse
  | TokensResponse
  | BalanceResponse
  | FrozenBalanceResponse
  | FrozenBalancesResponse
  | WhitelistedBalanceResponse
  | WhitelistedBalancesResponse
  | Ownership
  | ContractVersion;

// ********** Instantiate **********

export async function instantiate(
  deps: Deps,
  env: Env,
  info: MessageInfo,
  msg: InstantiateMsg
): Promise<Result<ContractResponse, Error>> {
  const { gate, identity } = handlesFor(deps.storage);
  const denom = deriveDenom(msg.subunit, env.contract.address);
  logger.debug({ denom, sender: info.sender }, 'Instantiating contract');

  const versionResult = await setContractVersion(deps.storage);
  if (versionResult.isErr()) {
    return err(versionResult.error);
  }

  const gateResult = await gate.initialize(info.sender);
  if (gateResult.isErr()) {
    return err(gateResult.error);
  }

  const saveResult = await identity.save(denom);
  if (saveResult.isErr()) {
    return err(saveResult.error);
  }

  const issue: IssueMsg = {
    type: 'issue',
    symbol: msg.symbol,
    subunit: msg.subunit,
    precision: msg.precision,
    initial_amount: msg.initialAmount.toString(),
    ...(msg.description === undefined ? {} : { description: msg.description }),
    ...(msg.features === undefined ? {} : { features: msg.features.map(featureCode) }),
    ...(msg.burnRate === undefined ? {} : { burn_rate: msg.burnRate }),
    ...(msg.sendCommissionRate === undefined ? {} : { send_commission_rate: msg.sendCommissionRate }),
    ...(msg.uri === undefined ? {} : { uri: msg.uri }),
    ...(msg.uriHash === undefined ? {} : { uri_hash: msg.uriHash }),
  };

  return ok({
    attributes: [attribute('owner', info.sender), attribute('denom', denom)],
    messages: [issue],
  });
}

// ********** Execute **********

export async function execute(
  deps: Deps,
  _env: Env,
  info: MessageInfo,
  msg: ExecuteMsg
): Promise<Result<ContractResponse, Error>> {
  const handles = handlesFor(deps.storage);
  logger.debug({ sender: info.sender, type: msg.type }, 'Executing message');

  switch (msg.type) {
    case 'mint': {
      const { amount, recipient } = msg;
      return runGated(handles, info, (denom) => ({
        amount,
        message: { type: 'mint', coin: coin(amount, denom), ...(recipient === undefined ? {} : { recipient }) },
      }));
    }
    case 'burn': {
      const { amount } = msg;
      return runGated(handles, info, (denom) => ({ amount, message: { type: 'burn', coin: coin(amount, denom) } }));
    }
    case 'freeze':
    case 'unfreeze':
    case 'setFrozen':
    case 'setWhitelistedLimit': {
      const { account, amount, type } = msg;
      return runGated(handles, info, (denom) => ({
        amount,
        message: { type: ACCOUNT_MSG_TYPES[type], account, coin: coin(amount, denom) },
      }));
    }
    case 'globallyFreeze':
      return runGated(handles, info, (denom) => ({ message: { type: 'globally_freeze', denom } }));
    case 'globallyUnfreeze':
      return runGated(handles, info, (denom) => ({ message: { type: 'globally_unfreeze', denom } }));
    case 'updateOwnership':
      return updateOwnership(handles.gate, info, msg.action);
    default: {
      const _exhaustive: never = msg;
      return err(new Error(`Unsupported execute message: ${JSON.stringify(_exhaustive)}`));
    }
  }
}

const ACCOUNT_MSG_TYPES = {
  freeze: 'freeze',
  unfreeze: 'unfreeze',
  setFrozen: 'set_frozen',
  setWhitelistedLimit: 'set_whitelisted_limit',
} as const;

interface GatedEffect {
  message: AssetFtMsg;
  amount?: bigint;
}

/**
 * The shared shape of every mutating operation: check the caller, load the
 * denomination, build exactly one message.
 */
async function runGated(
  handles: Handles,
  info: MessageInfo,
  build: (denom: string) => GatedEffect
): Promise<Result<ContractResponse, Error>> {
  const authorized = await handles.gate.assertCallerIsController(info.sender);
  if (authorized.isErr()) {
    return err(authorized.error);
  }

  const denom = await handles.identity.load();
  if (denom.isErr()) {
    return err(denom.error);
  }

  const { message, amount } = build(denom.value);
  const attributes: Attribute[] = [attribute('method', message.type), attribute('denom', denom.value)];
  if (amount !== undefined) {
    attributes.push(attribute('amount', amount));
  }
  return ok({ attributes, messages: [message] });
}

async function updateOwnership(
  gate: AuthorizationGate,
  info: MessageInfo,
  action: OwnershipAction
): Promise<Result<ContractResponse, Error>> {
  const updated =
    action.type === 'transferOwnership'
      ? await gate.transferOwnership(info.sender, action.newOwner)
      : await gate.acceptOwnership(info.sender);

  return updated.map((ownership) => {
    const method = action.type === 'transferOwnership' ? 'transfer_ownership' : 'accept_ownership';
    const attributes = [attribute('method', method), attribute('owner', ownership.owner)];
    if (ownership.pendingOwner !== null) {
      attributes.push(attribute('pending_owner', ownership.pendingOwner));
    }
    return { attributes, messages: [] };
  });
}

// ********** Queries **********

export async function query(deps: Deps, _env: Env, msg: QueryMsg): Promise<Result<QueryResponse, Error>> {
  const { gate, identity } = handlesFor(deps.storage);
  logger.debug({ type: msg.type }, 'Running query');

  switch (msg.type) {
    case 'params':
      return queryAssetFt(deps.querier, { type: 'params' }, ParamsResponseSchema);
    case 'token':
      return withDenom(identity, (denom) => queryAssetFt(deps.querier, { type: 'token', denom }, TokenResponseSchema));
    case 'tokens': {
      const { issuer } = msg;
      const collected = await queryAllPages(
        deps,
        'tokens',
        (pagination) => ({ type: 'tokens', issuer, pagination }),
        TokensResponseSchema,
        (page) => page.tokens
      );
      return collected.map(({ items, lastPage }) => ({ ...lastPage, tokens: items }));
    }
    case 'balance': {
      const { account } = msg;
      return withDenom(identity, (denom) =>
        queryAssetFt(deps.querier, { type: 'balance', account, denom }, BalanceResponseSchema)
      );
    }
    case 'frozenBalance': {
      const { account } = msg;
      return withDenom(identity, (denom) =>
        queryAssetFt(deps.querier, { type: 'frozen_balance', account, denom }, FrozenBalanceResponseSchema)
      );
    }
    case 'frozenBalances': {
      const { account } = msg;
      const collected = await queryAllPages(
        deps,
        'frozen_balances',
        (pagination) => ({ type: 'frozen_balances', account, pagination }),
        FrozenBalancesResponseSchema,
        (page) => page.balances
      );
      return collected.map(({ items, lastPage }) => ({ ...lastPage, balances: items }));
    }
    case 'whitelistedBalance': {
      const { account } = msg;
      return withDenom(identity, (denom) =>
        queryAssetFt(deps.querier, { type: 'whitelisted_balance', account, denom }, WhitelistedBalanceResponseSchema)
      );
    }
    case 'whitelistedBalances': {
      const { account } = msg;
      const collected = await queryAllPages(
        deps,
        'whitelisted_balances',
        (pagination) => ({ type: 'whitelisted_balances', account, pagination }),
        WhitelistedBalancesResponseSchema,
        (page) => page.balances
      );
      return collected.map(({ items, lastPage }) => ({ ...lastPage, balances: items }));
    }
    case 'ownership':
      return gate.ownership();
    case 'contractVersion':
      return getContractVersion(deps.storage);
    default: {
      const _exhaustive: never = msg;
      return err(new Error(`Unsupported query message: ${JSON.stringify(_exhaustive)}`));
    }
  }
}

async function withDenom<T>(
  identity: IdentityStore,
  run: (denom: string) => Promise<Result<T, Error>>
): Promise<Result<T, Error>> {
  const denom = await identity.load();
  if (denom.isErr()) {
    return err(denom.error);
  }
  return run(denom.value);
}

function queryAllPages<TPage extends { pagination: PageResponse }, TItem>(
  deps: Deps,
  label: string,
  buildRequest: (pagination: PageRequest | undefined) => AssetFtQuery,
  schema: ZodType<TPage, ZodTypeDef, unknown>,
  itemsOf: (page: TPage) => TItem[]
): Promise<Result<CollectedPages<TPage, TItem>, Error>> {
  const pages = paginate({
    fetchPage: (pagination) => queryAssetFt(deps.querier, buildRequest(pagination), schema),
    label,
    maxPages: deps.maxQueryPages,
    nextKey: (page) => page.pagination.next_key,
  });
  return collectAllPages(pages, itemsOf);
}
