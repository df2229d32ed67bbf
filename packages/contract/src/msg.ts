import { AddressSchema, RateSchema, Uint128Schema, untrimmedString } from '@ftgate/core';
import { z } from 'zod';

import { FEATURE_NAMES } from './assetft/features.js';

export const InstantiateMsgSchema = z.object({
  symbol: untrimmedString('Symbol'),
  subunit: untrimmedString('Subunit'),
  precision: z.number().int().nonnegative(),
  initialAmount: Uint128Schema,
  description: z.string().optional(),
  features: z.array(z.enum(FEATURE_NAMES)).optional(),
  burnRate: RateSchema.optional(),
  sendCommissionRate: RateSchema.optional(),
  uri: z.string().optional(),
  uriHash: z.string().optional(),
});

const AccountAmountFields = {
  account: AddressSchema,
  amount: Uint128Schema,
};

const OwnershipActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('transferOwnership'), newOwner: AddressSchema }),
  z.object({ type: z.literal('acceptOwnership') }),
]);

export const ExecuteMsgSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('mint'), amount: Uint128Schema, recipient: AddressSchema.optional() }),
  z.object({ type: z.literal('burn'), amount: Uint128Schema }),
  z.object({ type: z.literal('freeze'), ...AccountAmountFields }),
  z.object({ type: z.literal('unfreeze'), ...AccountAmountFields }),
  z.object({ type: z.literal('setFrozen'), ...AccountAmountFields }),
  z.object({ type: z.literal('globallyFreeze') }),
  z.object({ type: z.literal('globallyUnfreeze') }),
  z.object({ type: z.literal('setWhitelistedLimit'), ...AccountAmountFields }),
  z.object({ type: z.literal('updateOwnership'), action: OwnershipActionSchema }),
]);

export const QueryMsgSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('params') }),
  z.object({ type: z.literal('token') }),
  z.object({ type: z.literal('tokens'), issuer: AddressSchema }),
  z.object({ type: z.literal('balance'), account: AddressSchema }),
  z.object({ type: z.literal('frozenBalance'), account: AddressSchema }),
  z.object({ type: z.literal('frozenBalances'), account: AddressSchema }),
  z.object({ type: z.literal('whitelistedBalance'), account: AddressSchema }),
  z.object({ type: z.literal('whitelistedBalances'), account: AddressSchema }),
  z.object({ type: z.literal('ownership') }),
  z.object({ type: z.literal('contractVersion') }),
]);

export type InstantiateMsg = z.infer<typeof InstantiateMsgSchema>;
export type ExecuteMsg = z.infer<typeof ExecuteMsgSchema>;
export type OwnershipAction = z.infer<typeof OwnershipActionSchema>;
export type QueryMsg = z.infer<typeof QueryMsgSchema>;
