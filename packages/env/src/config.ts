import path from 'node:path';

import { z } from 'zod';

const envSchema = z.object({
  FTGATE_DATA_DIR: z.string().min(1).or(z.undefined()),
  FTGATE_MAX_QUERY_PAGES: z.coerce.number().int().positive().default(1000),
  FTGATE_NODE_URL: z.string().url().default('http://localhost:1317'),
  FTGATE_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

const NodeEnvSchema = z.enum(['development', 'production', 'test']);

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Parse an environment record. Exposed for tests; everything else goes
 * through the cached accessors below.
 */
export function parseEnv(env: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access and caches the result.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Forget the cached environment (tests that mutate process.env).
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Directory holding the contract state database.
 *
 * Priority:
 * 1. FTGATE_DATA_DIR environment variable (if set)
 * 2. process.cwd() + '/data' (default)
 */
export function getDataDirectory(): string {
  return validateEnv().FTGATE_DATA_DIR ?? path.join(process.cwd(), 'data');
}

/**
 * Upper bound on pages fetched by one aggregated query.
 */
export function getMaxQueryPages(): number {
  return validateEnv().FTGATE_MAX_QUERY_PAGES;
}

/**
 * REST gateway of the host chain node.
 */
export function getNodeUrl(): string {
  return validateEnv().FTGATE_NODE_URL;
}

export function getHttpTimeoutMs(): number {
  return validateEnv().FTGATE_HTTP_TIMEOUT_MS;
}

/**
 * True only when NODE_ENV is explicitly `development`. Checked on its own so
 * error rendering still works while the rest of the environment is invalid.
 */
export function isDevelopment(): boolean {
  const nodeEnv = NodeEnvSchema.safeParse(process.env['NODE_ENV']);
  return nodeEnv.success && nodeEnv.data === 'development';
}
