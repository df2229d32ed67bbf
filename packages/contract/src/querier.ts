import { formatZodIssues, fromZod, UpstreamError } from '@ftgate/core';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import type { AssetFtQuery } from './assetft/queries.js';

/**
 * Read access to the host asset-ft subsystem. Implementations return the raw
 * decoded response; failures are passed back to the caller as-is.
 */
export interface Querier {
  query(request: AssetFtQuery): Promise<Result<unknown, Error>>;
}

/**
 * Run a host query and check the answer against the expected response shape.
 * Querier errors propagate verbatim; a malformed answer becomes an UpstreamError.
 */
export async function queryAssetFt<T>(
  querier: Querier,
  request: AssetFtQuery,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<Result<T, Error>> {
  const response = await querier.query(request);
  if (response.isErr()) {
    return err(response.error);
  }

  const parsed = fromZod(schema, response.value);
  if (parsed.isErr()) {
    const issues = formatZodIssues(parsed.error);
    return err(
      new UpstreamError(`Malformed ${request.type} response from asset-ft`, {
        additionalContext: { issues },
        cause: parsed.error,
        operation: request.type,
      })
    );
  }
  return ok(parsed.value);
}
