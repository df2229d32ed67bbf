import { ASSET_FT_RESPONSE_SCHEMAS, type AssetFtQuery, type Querier } from '@ftgate/contract';
import { UpstreamError } from '@ftgate/core';
import { HttpClient, HttpError, ResponseValidationError, withQuery, type HttpEffects } from '@ftgate/http';
import { getLogger } from '@ftgate/logger';
import { err, ok, type Result } from 'neverthrow';

const API_PREFIX = '/coreum/asset/ft/v1';

const logger = getLogger('RestQuerier');

export interface RestQuerierConfig {
  nodeUrl: string;
  retries?: number | undefined;
  timeoutMs?: number | undefined;
}

/**
 * Map an asset-ft query onto the chain's REST gateway path.
 */
export function assetFtEndpoint(request: AssetFtQuery): string {
  switch (request.type) {
    case 'params':
      return `${API_PREFIX}/params`;
    case 'token':
      return `${API_PREFIX}/tokens/${encodeURIComponent(request.denom)}`;
    case 'tokens':
      return withQuery(`${API_PREFIX}/tokens`, {
        issuer: request.issuer,
        'pagination.key': request.pagination?.key,
      });
    case 'balance':
      return `${accountPath(request.account)}/balances/summary/${encodeURIComponent(request.denom)}`;
    case 'frozen_balance':
      return `${accountPath(request.account)}/balances/frozen/${encodeURIComponent(request.denom)}`;
    case 'frozen_balances':
      return withQuery(`${accountPath(request.account)}/balances/frozen`, {
        'pagination.key': request.pagination?.key,
      });
    case 'whitelisted_balance':
      return `${accountPath(request.account)}/balances/whitelisted/${encodeURIComponent(request.denom)}`;
    case 'whitelisted_balances':
      return withQuery(`${accountPath(request.account)}/balances/whitelisted`, {
        'pagination.key': request.pagination?.key,
      });
    default: {
      const _exhaustive: never = request;
      throw new Error(`Unsupported asset-ft query: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function accountPath(account: string): string {
  return `${API_PREFIX}/accounts/${encodeURIComponent(account)}`;
}

/**
 * Querier backed by a node's REST gateway. Every transport failure and every
 * body that is not the expected response shape surfaces as an UpstreamError.
 */
export class RestQuerier implements Querier {
  private readonly client: HttpClient;

  constructor(config: RestQuerierConfig, effects?: Partial<HttpEffects>) {
    this.client = new HttpClient(
      {
        baseUrl: config.nodeUrl,
        providerName: 'asset-ft-rest',
        retries: config.retries,
        timeout: config.timeoutMs,
      },
      effects
    );
  }

  async query(request: AssetFtQuery): Promise<Result<unknown, Error>> {
    const endpoint = assetFtEndpoint(request);
    logger.debug({ endpoint, type: request.type }, 'Querying asset-ft');

    const result = await this.client.get(endpoint, ASSET_FT_RESPONSE_SCHEMAS[request.type]);
    if (result.isOk()) {
      return ok(result.value);
    }

    const error = result.error;
    const additionalContext: Record<string, unknown> = { endpoint };
    if (error instanceof ResponseValidationError) {
      additionalContext['issues'] = error.validationIssues;
      return err(
        new UpstreamError(`Malformed ${request.type} response from asset-ft`, {
          additionalContext,
          cause: error,
          operation: request.type,
        })
      );
    }
    if (error instanceof HttpError) {
      additionalContext['statusCode'] = error.statusCode;
    }

    return err(
      new UpstreamError(`asset-ft ${request.type} query failed: ${error.message}`, {
        additionalContext,
        cause: error,
        operation: request.type,
      })
    );
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
