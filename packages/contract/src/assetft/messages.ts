import type { Coin } from '@ftgate/core';

/**
 * Effect messages handed to the host asset-ft subsystem, in its snake_case
 * wire shape. Amounts are decimal strings.
 */
export interface IssueMsg {
  type: 'issue';
  symbol: string;
  subunit: string;
  precision: number;
  initial_amount: string;
  description?: string;
  features?: number[];
  burn_rate?: string;
  send_commission_rate?: string;
  uri?: string;
  uri_hash?: string;
}

export interface MintMsg {
  type: 'mint';
  coin: Coin;
  recipient?: string;
}

export interface BurnMsg {
  type: 'burn';
  coin: Coin;
}

export interface AccountCoinMsg {
  type: 'freeze' | 'unfreeze' | 'set_frozen' | 'set_whitelisted_limit';
  account: string;
  coin: Coin;
}

export interface GlobalFreezeMsg {
  type: 'globally_freeze' | 'globally_unfreeze';
  denom: string;
}

export type AssetFtMsg = IssueMsg | MintMsg | BurnMsg | AccountCoinMsg | GlobalFreezeMsg;
