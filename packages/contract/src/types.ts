import type { Storage } from '@ftgate/storage';

import type { AssetFtMsg } from './assetft/messages.js';
import type { Querier } from './querier.js';

export const DEFAULT_MAX_QUERY_PAGES = 1000;

/**
 * Facts about the running contract instance supplied by the host.
 */
export interface Env {
  contract: {
    address: string;
  };
}

export interface MessageInfo {
  sender: string;
}

/**
 * Collaborators of a single invocation. `storage` is already the invocation's
 * write-buffering overlay when called through `ContractHost`.
 */
export interface Deps {
  storage: Storage;
  querier: Querier;
  maxQueryPages: number;
}

export interface Attribute {
  key: string;
  value: string;
}

export interface ContractResponse {
  attributes: Attribute[];
  messages: AssetFtMsg[];
}

export function attribute(key: string, value: string | bigint): Attribute {
  return { key, value: value.toString() };
}
