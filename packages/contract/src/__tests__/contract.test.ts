import {
  AlreadyInitializedError,
  NotFoundError,
  ResourceExhaustedError,
  UnauthorizedError,
  UpstreamError,
  ValidationError,
} from '@ftgate/core';
import { MemoryStorage } from '@ftgate/storage';
import { err, ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { ContractHost } from '../host.js';

import { makeToken, noUpstream, pagedResponder, ScriptedQuerier } from './scripted-querier.js';

const OWNER = 'owner1';
const DENOM = 'uabc-contractx';

const instantiateMsg = {
  initialAmount: '5000',
  precision: 6,
  subunit: 'uabc',
  symbol: 'ABC',
};

async function setup(querier = new ScriptedQuerier(noUpstream), maxQueryPages?: number) {
  const storage = new MemoryStorage();
  const host = new ContractHost({ address: 'contractX', maxQueryPages, querier, storage });
  const result = await host.instantiate(OWNER, instantiateMsg);
  result._unsafeUnwrap();
  return { host, querier, storage };
}

describe('instantiate', () => {
  it('derives the denomination and issues the token', async () => {
    const host = new ContractHost({
      address: 'contractX',
      querier: new ScriptedQuerier(noUpstream),
      storage: new MemoryStorage(),
    });

    const response = (await host.instantiate(OWNER, instantiateMsg))._unsafeUnwrap();

    expect(response.attributes).toEqual([
      { key: 'owner', value: OWNER },
      { key: 'denom', value: DENOM },
    ]);
    expect(response.messages).toEqual([
      { initial_amount: '5000', precision: 6, subunit: 'uabc', symbol: 'ABC', type: 'issue' },
    ]);
  });

  it('carries every optional parameter on the issue message', async () => {
    const host = new ContractHost({
      address: 'core1Contract',
      querier: new ScriptedQuerier(noUpstream),
      storage: new MemoryStorage(),
    });

    const response = (
      await host.instantiate(OWNER, {
        ...instantiateMsg,
        burnRate: '0.1',
        description: 'test token',
        features: ['minting', 'freezing', 'clawback'],
        sendCommissionRate: '0.25',
        uri: 'https://example.com/abc.json',
        uriHash: 'abc123',
      })
    )._unsafeUnwrap();

    expect(response.attributes[1]).toEqual({ key: 'denom', value: 'uabc-core1contract' });
    expect(response.messages).toEqual([
      {
        burn_rate: '0.1',
        description: 'test token',
        features: [0, 1, 5],
        initial_amount: '5000',
        precision: 6,
        send_commission_rate: '0.25',
        subunit: 'uabc',
        symbol: 'ABC',
        type: 'issue',
        uri: 'https://example.com/abc.json',
        uri_hash: 'abc123',
      },
    ]);
  });

  it('records owner, denomination and contract version', async () => {
    const { storage } = await setup();

    expect(storage.snapshot()).toEqual({
      contract_info: '{"contract":"ftgate:asset-ft","version":"0.1.0"}',
      denom: '"uabc-contractx"',
      ownership: '{"owner":"owner1","pendingOwner":null}',
    });
  });

  it('rejects a second instantiation and leaves state untouched', async () => {
    const { host, storage } = await setup();
    const before = storage.snapshot();

    const result = await host.instantiate('someone-else', { ...instantiateMsg, subunit: 'uxyz' });

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(AlreadyInitializedError);
    expect(error.message).toBe('"ownership" is already initialized');
    expect(storage.snapshot()).toEqual(before);
  });

  it('derives the denomination from the subunit exactly as sent', async () => {
    const storage = new MemoryStorage();
    const host = new ContractHost({ address: 'contractX', querier: new ScriptedQuerier(noUpstream), storage });

    const result = await host.instantiate(OWNER, { ...instantiateMsg, subunit: ' uabc ' });

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('Validation failed: subunit: Subunit must not have surrounding whitespace');
    expect(storage.snapshot()).toEqual({});
  });

  it('rejects an invalid message before touching storage', async () => {
    const storage = new MemoryStorage();
    const host = new ContractHost({ address: 'contractX', querier: new ScriptedQuerier(noUpstream), storage });

    const result = await host.instantiate(OWNER, { ...instantiateMsg, burnRate: '1.5' });

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('Validation failed: burnRate: Must be a decimal between 0 and 1');
    expect(storage.snapshot()).toEqual({});
  });
});

describe('execute', () => {
  it('mints for the controller with exactly one message', async () => {
    const { host } = await setup();

    const response = (await host.execute(OWNER, { amount: '1000', type: 'mint' }))._unsafeUnwrap();

    expect(response.messages).toEqual([{ coin: { amount: '1000', denom: DENOM }, type: 'mint' }]);
    expect(response.attributes).toEqual([
      { key: 'method', value: 'mint' },
      { key: 'denom', value: DENOM },
      { key: 'amount', value: '1000' },
    ]);
  });

  it('rejects a non-controller without producing an effect', async () => {
    const { host, storage } = await setup();
    const before = storage.snapshot();

    const result = await host.execute('intruder', { amount: '1000', type: 'mint' });

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(UnauthorizedError);
    expect(error.message).toBe('Caller intruder is not the contract owner');
    expect(storage.snapshot()).toEqual(before);
  });

  it('forwards the mint recipient', async () => {
    const { host } = await setup();

    const response = (
      await host.execute(OWNER, { amount: 7, recipient: 'core1recipient', type: 'mint' })
    )._unsafeUnwrap();

    expect(response.messages).toEqual([
      { coin: { amount: '7', denom: DENOM }, recipient: 'core1recipient', type: 'mint' },
    ]);
  });

  it.each([
    [{ amount: '5', type: 'burn' }, { coin: { amount: '5', denom: DENOM }, type: 'burn' }, 'burn'],
    [
      { account: 'core1acct', amount: '10', type: 'freeze' },
      { account: 'core1acct', coin: { amount: '10', denom: DENOM }, type: 'freeze' },
      'freeze',
    ],
    [
      { account: 'core1acct', amount: '3', type: 'unfreeze' },
      { account: 'core1acct', coin: { amount: '3', denom: DENOM }, type: 'unfreeze' },
      'unfreeze',
    ],
    [
      { account: 'core1acct', amount: '4', type: 'setFrozen' },
      { account: 'core1acct', coin: { amount: '4', denom: DENOM }, type: 'set_frozen' },
      'set_frozen',
    ],
    [
      { account: 'core1acct', amount: '340282366920938463463374607431768211455', type: 'setWhitelistedLimit' },
      {
        account: 'core1acct',
        coin: { amount: '340282366920938463463374607431768211455', denom: DENOM },
        type: 'set_whitelisted_limit',
      },
      'set_whitelisted_limit',
    ],
  ])('builds one message for %o', async (msg, expectedMessage, method) => {
    const { host } = await setup();

    const response = (await host.execute(OWNER, msg))._unsafeUnwrap();

    expect(response.messages).toEqual([expectedMessage]);
    expect(response.attributes[0]).toEqual({ key: 'method', value: method });
    expect(response.attributes[1]).toEqual({ key: 'denom', value: DENOM });
    expect(response.attributes).toHaveLength(3);
  });

  it.each([
    ['globallyFreeze', 'globally_freeze'],
    ['globallyUnfreeze', 'globally_unfreeze'],
  ])('builds a %s message without an amount', async (type, wireType) => {
    const { host } = await setup();

    const response = (await host.execute(OWNER, { type }))._unsafeUnwrap();

    expect(response.messages).toEqual([{ denom: DENOM, type: wireType }]);
    expect(response.attributes).toEqual([
      { key: 'method', value: wireType },
      { key: 'denom', value: DENOM },
    ]);
  });

  it.each([
    { amount: '1', type: 'mint' },
    { amount: '1', type: 'burn' },
    { account: 'core1acct', amount: '1', type: 'freeze' },
    { account: 'core1acct', amount: '1', type: 'unfreeze' },
    { account: 'core1acct', amount: '1', type: 'setFrozen' },
    { type: 'globallyFreeze' },
    { type: 'globallyUnfreeze' },
    { account: 'core1acct', amount: '1', type: 'setWhitelistedLimit' },
  ])('rejects $type from a non-controller and leaves storage unchanged', async (msg) => {
    const { host, storage } = await setup();
    const before = storage.snapshot();

    const result = await host.execute('intruder', msg);

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(UnauthorizedError);
    expect(error.message).toBe('Caller intruder is not the contract owner');
    expect(storage.snapshot()).toEqual(before);
  });

  it('fails with NotFound before instantiation', async () => {
    const host = new ContractHost({
      address: 'contractX',
      querier: new ScriptedQuerier(noUpstream),
      storage: new MemoryStorage(),
    });

    const error = (await host.execute(OWNER, { amount: '1', type: 'mint' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('No value stored under "ownership"');
  });

  it('rejects amounts outside the u128 range', async () => {
    const { host } = await setup();

    const result = await host.execute(OWNER, {
      amount: '340282366920938463463374607431768211456',
      type: 'mint',
    });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(ValidationError);
  });

  it('rejects unknown message types', async () => {
    const { host } = await setup();

    const result = await host.execute(OWNER, { type: 'renounceOwnership' });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(ValidationError);
  });
});

describe('ownership transfer', () => {
  it('moves the controller role in two steps', async () => {
    const { host } = await setup();

    const transferred = (
      await host.execute(OWNER, { action: { newOwner: 'owner2', type: 'transferOwnership' }, type: 'updateOwnership' })
    )._unsafeUnwrap();
    expect(transferred).toEqual({
      attributes: [
        { key: 'method', value: 'transfer_ownership' },
        { key: 'owner', value: OWNER },
        { key: 'pending_owner', value: 'owner2' },
      ],
      messages: [],
    });

    const stolen = await host.execute('intruder', { action: { type: 'acceptOwnership' }, type: 'updateOwnership' });
    expect(stolen._unsafeUnwrapErr().message).toBe('Caller intruder is not the pending owner');

    const accepted = (
      await host.execute('owner2', { action: { type: 'acceptOwnership' }, type: 'updateOwnership' })
    )._unsafeUnwrap();
    expect(accepted.attributes).toEqual([
      { key: 'method', value: 'accept_ownership' },
      { key: 'owner', value: 'owner2' },
    ]);

    expect((await host.execute(OWNER, { amount: '1', type: 'mint' }))._unsafeUnwrapErr()).toBeInstanceOf(
      UnauthorizedError
    );
    expect((await host.execute('owner2', { amount: '1', type: 'mint' }))._unsafeUnwrap().messages).toHaveLength(1);
    expect((await host.query({ type: 'ownership' }))._unsafeUnwrap()).toEqual({ owner: 'owner2', pendingOwner: null });
  });

  it('only lets the controller start a transfer', async () => {
    const { host } = await setup();

    const result = await host.execute('intruder', {
      action: { newOwner: 'intruder', type: 'transferOwnership' },
      type: 'updateOwnership',
    });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(UnauthorizedError);
  });

  it('fails to accept when nothing is pending', async () => {
    const { host } = await setup();

    const error = (
      await host.execute(OWNER, { action: { type: 'acceptOwnership' }, type: 'updateOwnership' })
    )._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('No ownership transfer is pending');
  });
});

describe('query', () => {
  it('queries the token with the denomination from instantiation', async () => {
    const token = { ...makeToken(DENOM, OWNER), globally_frozen: false, extra_field: 'kept' };
    const querier = new ScriptedQuerier(() => ok({ token }));
    const { host } = await setup(querier);

    const response = (await host.query({ type: 'token' }))._unsafeUnwrap();

    expect(querier.requests).toEqual([{ denom: DENOM, type: 'token' }]);
    expect(response).toEqual({ token });
  });

  it('returns identical results for a repeated single-shot query', async () => {
    const balance = { balance: '100', frozen: '10', locked: '0', whitelisted: '50' };
    const querier = new ScriptedQuerier(() => ok(balance));
    const { host } = await setup(querier);

    const first = (await host.query({ account: 'core1acct', type: 'balance' }))._unsafeUnwrap();
    const second = (await host.query({ account: 'core1acct', type: 'balance' }))._unsafeUnwrap();

    expect(first).toEqual(balance);
    expect(second).toEqual(first);
    expect(querier.requests).toEqual([
      { account: 'core1acct', denom: DENOM, type: 'balance' },
      { account: 'core1acct', denom: DENOM, type: 'balance' },
    ]);
  });

  it('forwards numeric amounts without re-encoding them', async () => {
    const balance = { balance: 10, frozen: 0, locked: 0, whitelisted: 0 };
    const frozenBalance = { balance: { amount: 42, denom: DENOM } };
    const querier = new ScriptedQuerier((request) => ok(request.type === 'balance' ? balance : frozenBalance));
    const { host } = await setup(querier);

    expect((await host.query({ account: 'core1acct', type: 'balance' }))._unsafeUnwrap()).toEqual(balance);
    expect((await host.query({ account: 'core1acct', type: 'frozenBalance' }))._unsafeUnwrap()).toEqual(frozenBalance);
  });

  it('scopes frozen and whitelisted balance queries to the denomination', async () => {
    const querier = new ScriptedQuerier(() => ok({ balance: { amount: '42', denom: DENOM } }));
    const { host } = await setup(querier);

    const frozen = (await host.query({ account: 'core1acct', type: 'frozenBalance' }))._unsafeUnwrap();
    const whitelisted = (await host.query({ account: 'core1acct', type: 'whitelistedBalance' }))._unsafeUnwrap();

    expect(frozen).toEqual({ balance: { amount: '42', denom: DENOM } });
    expect(whitelisted).toEqual({ balance: { amount: '42', denom: DENOM } });
    expect(querier.requests).toEqual([
      { account: 'core1acct', denom: DENOM, type: 'frozen_balance' },
      { account: 'core1acct', denom: DENOM, type: 'whitelisted_balance' },
    ]);
  });

  it('passes params through without a denomination', async () => {
    const params = { params: { issue_fee: { amount: '10000000', denom: 'ucore' }, token_upgrade_grace_period: '604800s' } };
    const querier = new ScriptedQuerier(() => ok(params));
    const { host } = await setup(querier);

    expect((await host.query({ type: 'params' }))._unsafeUnwrap()).toEqual(params);
    expect(querier.requests).toEqual([{ type: 'params' }]);
  });

  it('aggregates every page of tokens with the last page metadata', async () => {
    const [a, b, c] = [makeToken('ua-issuer1'), makeToken('ub-issuer1'), makeToken('uc-issuer1')];
    const querier = new ScriptedQuerier(
      pagedResponder({ X: { pagination: { next_key: null, total: '3' }, tokens: [c] } }, {
        pagination: { next_key: 'X' },
        tokens: [a, b],
      })
    );
    const { host } = await setup(querier);

    const response = (await host.query({ issuer: 'issuer1', type: 'tokens' }))._unsafeUnwrap();

    expect(response).toEqual({ pagination: { next_key: null, total: '3' }, tokens: [a, b, c] });
    expect(querier.requests).toEqual([
      { issuer: 'issuer1', pagination: undefined, type: 'tokens' },
      { issuer: 'issuer1', pagination: { key: 'X' }, type: 'tokens' },
    ]);
  });

  it('aggregates frozen and whitelisted balance pages', async () => {
    const coinA = { amount: '1', denom: 'ua-issuer1' };
    const coinB = { amount: '2', denom: 'ub-issuer1' };
    const querier = new ScriptedQuerier(
      pagedResponder({ K: { balances: [coinB], pagination: {} } }, { balances: [coinA], pagination: { next_key: 'K' } })
    );
    const { host } = await setup(querier);

    const frozen = (await host.query({ account: 'core1acct', type: 'frozenBalances' }))._unsafeUnwrap();
    const whitelisted = (await host.query({ account: 'core1acct', type: 'whitelistedBalances' }))._unsafeUnwrap();

    expect(frozen).toEqual({ balances: [coinA, coinB], pagination: {} });
    expect(whitelisted).toEqual({ balances: [coinA, coinB], pagination: {} });
    expect(querier.requests.map((request) => request.type)).toEqual([
      'frozen_balances',
      'frozen_balances',
      'whitelisted_balances',
      'whitelisted_balances',
    ]);
  });

  it('fails with ResourceExhausted when pages never end', async () => {
    const querier = new ScriptedQuerier(() => ok({ pagination: { next_key: 'loop' }, tokens: [] }));
    const { host } = await setup(querier, 5);

    const error = (await host.query({ issuer: 'issuer1', type: 'tokens' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ResourceExhaustedError);
    expect(querier.requests).toHaveLength(5);
  });

  it.each([Number.NaN, 0, -1, 2.5])('refuses a maxQueryPages of %s', (maxQueryPages) => {
    const create = () =>
      new ContractHost({
        address: 'contractX',
        maxQueryPages,
        querier: new ScriptedQuerier(noUpstream),
        storage: new MemoryStorage(),
      });

    expect(create).toThrow(ValidationError);
    expect(create).toThrow('Validation failed: maxQueryPages: Must be a positive integer');
  });

  it('propagates querier errors verbatim', async () => {
    const upstream = new UpstreamError('account not found');
    const querier = new ScriptedQuerier(() => err(upstream));
    const { host } = await setup(querier);

    expect((await host.query({ account: 'core1acct', type: 'balance' }))._unsafeUnwrapErr()).toBe(upstream);
  });

  it('reports a malformed upstream response as UpstreamError', async () => {
    const querier = new ScriptedQuerier(() => ok({ token: { denom: DENOM } }));
    const { host } = await setup(querier);

    const error = (await host.query({ type: 'token' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error.message).toBe('Malformed token response from asset-ft');
  });

  it('answers ownership and version queries locally', async () => {
    const querier = new ScriptedQuerier(noUpstream);
    const { host } = await setup(querier);

    expect((await host.query({ type: 'ownership' }))._unsafeUnwrap()).toEqual({ owner: OWNER, pendingOwner: null });
    expect((await host.query({ type: 'contractVersion' }))._unsafeUnwrap()).toEqual({
      contract: 'ftgate:asset-ft',
      version: '0.1.0',
    });
    expect(querier.requests).toHaveLength(0);
  });

  it('fails denomination-scoped queries before instantiation', async () => {
    const querier = new ScriptedQuerier(noUpstream);
    const host = new ContractHost({ address: 'contractX', querier, storage: new MemoryStorage() });

    const error = (await host.query({ type: 'token' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(NotFoundError);
    expect(querier.requests).toHaveLength(0);
  });
});
