export interface ContractStateTable {
  /** Contract address the entry belongs to */
  namespace: string;
  key: string;
  value: string;
  updated_at: string;
}

export interface StateDatabase {
  contract_state: ContractStateTable;
}
