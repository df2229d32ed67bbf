import { CoinSchema, WireIntegerSchema } from '@ftgate/core';
import { z, type ZodType, type ZodTypeDef } from 'zod';

import type { AssetFtQuery } from './queries.js';

/**
 * Host response shapes. Every object passes unknown fields through so the
 * caller receives the upstream answer unchanged.
 */

export const PageResponseSchema = z
  .object({
    next_key: z.string().nullish(),
    total: WireIntegerSchema.optional(),
  })
  .passthrough();

export const ParamsResponseSchema = z
  .object({
    params: z
      .object({
        issue_fee: CoinSchema,
      })
      .passthrough(),
  })
  .passthrough();

export const TokenSchema = z
  .object({
    denom: z.string(),
    issuer: z.string(),
    symbol: z.string(),
    subunit: z.string(),
    precision: z.number().int().nonnegative(),
    description: z.string().optional(),
    globally_frozen: z.boolean().optional(),
    features: z.array(z.union([z.number().int(), z.string()])).optional(),
    burn_rate: z.string(),
    send_commission_rate: z.string(),
    version: z.number().int().optional(),
    uri: z.string().optional(),
    uri_hash: z.string().optional(),
    admin: z.string().optional(),
  })
  .passthrough();

export const TokenResponseSchema = z.object({ token: TokenSchema }).passthrough();

export const TokensResponseSchema = z
  .object({
    pagination: PageResponseSchema,
    tokens: z.array(TokenSchema),
  })
  .passthrough();

export const BalanceResponseSchema = z
  .object({
    balance: WireIntegerSchema,
    whitelisted: WireIntegerSchema,
    frozen: WireIntegerSchema,
    locked: WireIntegerSchema,
    locked_in_vesting: WireIntegerSchema.optional(),
    locked_in_dex: WireIntegerSchema.optional(),
    expected_to_receive_in_dex: WireIntegerSchema.optional(),
  })
  .passthrough();

export const FrozenBalanceResponseSchema = z.object({ balance: CoinSchema }).passthrough();

export const FrozenBalancesResponseSchema = z
  .object({
    pagination: PageResponseSchema,
    balances: z.array(CoinSchema),
  })
  .passthrough();

export const WhitelistedBalanceResponseSchema = z.object({ balance: CoinSchema }).passthrough();

export const WhitelistedBalancesResponseSchema = z
  .object({
    pagination: PageResponseSchema,
    balances: z.array(CoinSchema),
  })
  .passthrough();

/**
 * Expected response shape for each outbound query kind.
 */
export const ASSET_FT_RESPONSE_SCHEMAS: Record<AssetFtQuery['type'], ZodType<unknown, ZodTypeDef, unknown>> = {
  balance: BalanceResponseSchema,
  frozen_balance: FrozenBalanceResponseSchema,
  frozen_balances: FrozenBalancesResponseSchema,
  params: ParamsResponseSchema,
  token: TokenResponseSchema,
  tokens: TokensResponseSchema,
  whitelisted_balance: WhitelistedBalanceResponseSchema,
  whitelisted_balances: WhitelistedBalancesResponseSchema,
};

export type PageResponse = z.infer<typeof PageResponseSchema>;
export type ParamsResponse = z.infer<typeof ParamsResponseSchema>;
export type Token = z.infer<typeof TokenSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type TokensResponse = z.infer<typeof TokensResponseSchema>;
export type BalanceResponse = z.infer<typeof BalanceResponseSchema>;
export type FrozenBalanceResponse = z.infer<typeof FrozenBalanceResponseSchema>;
export type FrozenBalancesResponse = z.infer<typeof FrozenBalancesResponseSchema>;
export type WhitelistedBalanceResponse = z.infer<typeof WhitelistedBalanceResponseSchema>;
export type WhitelistedBalancesResponse = z.infer<typeof WhitelistedBalancesResponseSchema>;
