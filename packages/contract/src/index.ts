export * from './assetft/index.js';
export { execute, instantiate, query, type QueryResponse } from './contract.js';
export { ContractHost, type ContractHostOptions } from './host.js';
export { executeInvocation } from './invocation.js';
export {
  ExecuteMsgSchema,
  InstantiateMsgSchema,
  QueryMsgSchema,
  type ExecuteMsg,
  type InstantiateMsg,
  type OwnershipAction,
  type QueryMsg,
} from './msg.js';
export { AuthorizationGate, type Ownership } from './ownership/authorization-gate.js';
export { collectAllPages, paginate, type CollectedPages, type PaginateOptions } from './pagination/paginate.js';
export { queryAssetFt, type Querier } from './querier.js';
export {
  CONTRACT_NAME,
  CONTRACT_VERSION,
  getContractVersion,
  setContractVersion,
  type ContractVersion,
} from './state/contract-version.js';
export { deriveDenom, IdentityStore } from './state/identity-store.js';
export { Item } from './state/item.js';
export {
  attribute,
  DEFAULT_MAX_QUERY_PAGES,
  type Attribute,
  type ContractResponse,
  type Deps,
  type Env,
  type MessageInfo,
} from './types.js';
