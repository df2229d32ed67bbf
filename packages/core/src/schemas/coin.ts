import { z } from 'zod';

import { WireIntegerSchema } from './primitives.js';

/**
 * Coin as built for outbound host messages: amount as an integer string.
 */
export interface Coin {
  amount: string;
  denom: string;
}

/**
 * Coin as the host returns it. The amount is checked but not re-encoded, and
 * unknown fields pass through.
 */
export const CoinSchema = z
  .object({
    denom: z.string(),
    amount: WireIntegerSchema,
  })
  .passthrough();

export type WireCoin = z.infer<typeof CoinSchema>;

export function coin(amount: bigint, denom: string): Coin {
  return { amount: amount.toString(), denom };
}
