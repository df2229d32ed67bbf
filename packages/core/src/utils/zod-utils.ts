import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import { ValidationError } from '../errors/index.js';

/**
 * Validates an input against a Zod schema and returns a neverthrow Result.
 */
export function fromZod<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): Result<T, ZodError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/**
 * Flatten zod issues into `{ path, message }` pairs with dotted paths.
 */
export function formatZodIssues(error: ZodError): { message: string; path: string }[] {
  return error.issues.map((issue) => ({ message: issue.message, path: issue.path.join('.') }));
}

/**
 * Like `fromZod`, but maps failures to a ValidationError so callers only see
 * domain errors.
 */
export function parseWithSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  operation?: string
): Result<T, ValidationError> {
  return fromZod(schema, input).mapErr((error) => new ValidationError(formatZodIssues(error), { operation }));
}
