/**
 * Error hierarchy shared by every ftgate package.
 *
 * Each error carries a machine-readable code so the entry points (CLI, host
 * adapters) can map failures to exit codes and structured responses without
 * string matching.
 */

export type DomainErrorCode =
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'ALREADY_INITIALIZED'
  | 'UPSTREAM_FAILURE'
  | 'RESOURCE_EXHAUSTED'
  | 'VALIDATION_ERROR';

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  cause?: unknown;
  operation?: string | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly operation?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message, context?.cause === undefined ? undefined : { cause: context.cause });
    this.timestamp = new Date().toISOString();
    this.operation = context?.operation;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      operation: this.operation,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Caller is not allowed to perform the requested mutation
 */
export class UnauthorizedError extends DomainError {
  readonly code = 'UNAUTHORIZED';
  readonly severity = 'error' as const;

  constructor(
    public readonly caller: string,
    message = `Caller ${caller} is not the contract owner`,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * A storage slot that must exist was never written
 */
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';
  readonly severity = 'error' as const;

  constructor(
    public readonly key: string,
    message = `No value stored under "${key}"`,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * A write-once slot was written a second time
 */
export class AlreadyInitializedError extends DomainError {
  readonly code = 'ALREADY_INITIALIZED';
  readonly severity = 'error' as const;

  constructor(
    public readonly key: string,
    context?: DomainErrorContext
  ) {
    super(`"${key}" is already initialized`, context);
  }
}

/**
 * The host subsystem rejected a query or answered with an unexpected shape
 */
export class UpstreamError extends DomainError {
  readonly code = 'UPSTREAM_FAILURE';
  readonly severity = 'error' as const;
}

export class ResourceExhaustedError extends DomainError {
  readonly code = 'RESOURCE_EXHAUSTED';
  readonly severity = 'error' as const;

  constructor(
    public readonly limit: number,
    message: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * Validation failure with the individual issues that caused it
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = 'error' as const;

  constructor(
    public readonly issues: { message: string; path: string }[],
    context?: DomainErrorContext
  ) {
    const details = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
    super(`Validation failed: ${details.join('; ')}`, context);
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
