import { AddressSchema } from '@ftgate/core';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * Options shared by every contract command: which instance to address.
 */
export const ContractCommandOptionsSchema = z
  .object({
    contract: AddressSchema,
  })
  .extend(JsonFlagSchema.shape);

/**
 * Options for commands that act on behalf of a sender.
 */
export const SenderCommandOptionsSchema = ContractCommandOptionsSchema.extend({
  sender: AddressSchema,
});

export const InstantiateCommandOptionsSchema = SenderCommandOptionsSchema.extend({
  symbol: z.string(),
  subunit: z.string(),
  precision: z.coerce.number().int().nonnegative(),
  initialAmount: z.string(),
  description: z.string().optional(),
  features: z.string().optional(),
  burnRate: z.string().optional(),
  sendCommissionRate: z.string().optional(),
  uri: z.string().optional(),
  uriHash: z.string().optional(),
});

export type ContractCommandOptions = z.infer<typeof ContractCommandOptionsSchema>;
export type SenderCommandOptions = z.infer<typeof SenderCommandOptionsSchema>;
export type InstantiateCommandOptions = z.infer<typeof InstantiateCommandOptionsSchema>;
