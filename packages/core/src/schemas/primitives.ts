import { z } from 'zod';

import { isValidRate } from '../utils/decimal-utils.js';

export const UINT128_MAX = (1n << 128n) - 1n;

/**
 * Unsigned 128-bit integer. Accepts a decimal string, a safe integer or a
 * bigint and transforms to bigint.
 */
export const Uint128Schema = z
  .union([
    z.string().regex(/^\d+$/, 'Must be a non-negative integer string'),
    z.number().int().nonnegative().safe(),
    z.bigint().nonnegative(),
  ])
  .transform((val) => BigInt(val))
  .refine((val) => val <= UINT128_MAX, { message: 'Must fit in 128 bits' });

/**
 * Integer fields the host may encode either as numbers or as strings.
 * Validated only; the value keeps the encoding it arrived in.
 */
export const WireIntegerSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/, 'Must be a non-negative integer string'),
]);

/**
 * Non-empty string taken exactly as written. Surrounding whitespace is an
 * error rather than something to strip.
 */
export function untrimmedString(label: string) {
  return z
    .string()
    .min(1, `${label} must not be empty`)
    .refine((val) => val.trim() === val, { message: `${label} must not have surrounding whitespace` });
}

export const AddressSchema = untrimmedString('Address');

/**
 * Decimal fraction between 0 and 1, kept as the caller wrote it.
 */
export const RateSchema = z.string().refine(isValidRate, { message: 'Must be a decimal between 0 and 1' });
