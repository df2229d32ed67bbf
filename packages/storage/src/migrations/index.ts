import type { Migration } from 'kysely';

import * as contractState from './001_contract_state.js';

export const stateMigrations: Record<string, Migration> = {
  '001_contract_state': contractState,
};
