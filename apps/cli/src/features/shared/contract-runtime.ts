import path from 'node:path';

import { ContractHost } from '@ftgate/contract';
import { wrapError } from '@ftgate/core';
import { getDataDirectory, getHttpTimeoutMs, getMaxQueryPages, getNodeUrl } from '@ftgate/env';
import { getLogger } from '@ftgate/logger';
import { RestQuerier } from '@ftgate/rest-querier';
import { closeSqliteDatabase, openStateDatabase, SqliteStorage } from '@ftgate/storage';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('contract-runtime');

export const STATE_DATABASE_FILE = 'ftgate.db';

/**
 * A contract instance wired to the local state database and the node's REST
 * gateway. `dispose()` releases both.
 */
export interface ContractRuntime {
  host: ContractHost;
  dispose(): Promise<void>;
}

export type OpenContractRuntime = (contract: string) => Promise<Result<ContractRuntime, Error>>;

export const openContractRuntime: OpenContractRuntime = async (contract) => {
  let settings: { dataDir: string; maxQueryPages: number; nodeUrl: string; timeoutMs: number };
  try {
    settings = {
      dataDir: getDataDirectory(),
      maxQueryPages: getMaxQueryPages(),
      nodeUrl: getNodeUrl(),
      timeoutMs: getHttpTimeoutMs(),
    };
  } catch (error) {
    return wrapError(error, 'Invalid configuration');
  }

  const dbPath = path.join(settings.dataDir, STATE_DATABASE_FILE);
  const dbResult = await openStateDatabase(dbPath);
  if (dbResult.isErr()) {
    return err(dbResult.error);
  }
  const db = dbResult.value;

  const querier = new RestQuerier({ nodeUrl: settings.nodeUrl, timeoutMs: settings.timeoutMs });
  const host = new ContractHost({
    address: contract,
    maxQueryPages: settings.maxQueryPages,
    querier,
    storage: new SqliteStorage(db, contract),
  });

  logger.debug({ contract, dbPath, nodeUrl: settings.nodeUrl }, 'Opened contract runtime');

  return ok({
    host,
    dispose: async () => {
      await querier.close();
      const closed = await closeSqliteDatabase(db);
      if (closed.isErr()) {
        logger.warn({ error: closed.error }, 'Failed to close state database');
      }
    },
  });
};
