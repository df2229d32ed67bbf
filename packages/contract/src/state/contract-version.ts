import type { Storage } from '@ftgate/storage';
import type { Result } from 'neverthrow';
import { z } from 'zod';

import { Item } from './item.js';

export const CONTRACT_NAME = 'ftgate:asset-ft';
export const CONTRACT_VERSION = '0.1.0';

const ContractVersionSchema = z.object({
  contract: z.string(),
  version: z.string(),
});

export type ContractVersion = z.infer<typeof ContractVersionSchema>;

const CONTRACT_INFO = new Item('contract_info', ContractVersionSchema);

export function setContractVersion(storage: Storage): Promise<Result<void, Error>> {
  return CONTRACT_INFO.save(storage, { contract: CONTRACT_NAME, version: CONTRACT_VERSION });
}

export function getContractVersion(storage: Storage): Promise<Result<ContractVersion, Error>> {
  return CONTRACT_INFO.load(storage);
}
