/**
 * Continuation for paginated host queries. Only the key is ever set.
 */
export interface PageRequest {
  key: string;
}

/**
 * Queries sent to the host asset-ft subsystem. Denomination-scoped kinds carry
 * the stored denom; paginated kinds carry the continuation of the previous page.
 */
export type AssetFtQuery =
  | { type: 'params' }
  | { type: 'token'; denom: string }
  | { type: 'tokens'; issuer: string; pagination?: PageRequest | undefined }
  | { type: 'balance'; account: string; denom: string }
  | { type: 'frozen_balance'; account: string; denom: string }
  | { type: 'frozen_balances'; account: string; pagination?: PageRequest | undefined }
  | { type: 'whitelisted_balance'; account: string; denom: string }
  | { type: 'whitelisted_balances'; account: string; pagination?: PageRequest | undefined };

export type AssetFtQueryType = AssetFtQuery['type'];
