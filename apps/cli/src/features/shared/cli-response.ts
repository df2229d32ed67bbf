import { isDomainError } from '@ftgate/core';
import { isDevelopment } from '@ftgate/env';

/**
 * Standardized CLI response format, printed with --json.
 */
export interface CLIResponse<T = unknown> {
  /** Whether the command executed successfully */
  success: boolean;

  /** Command that was executed */
  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  /** Response data (only present on success) */
  data?: T;

  /** Error information (only present on failure) */
  error?:
    | {
        /** Machine-readable error code */
        code: string;

        /** Additional error details (optional) */
        details?: unknown;

        /** Human-readable error message */
        message: string;

        /** Stack trace (only in development mode) */
        stack?: string | undefined;
      }
    | undefined;
}

export function createSuccessResponse<T>(command: string, data: T): CLIResponse<T> {
  return {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };
}

export function createErrorResponse(command: string, error: Error): CLIResponse<never> {
  const errorObj: { code: string; details?: unknown; message: string; stack?: string | undefined } = {
    code: errorCodeFor(error),
    message: error.message,
  };

  if (isDomainError(error) && error.context !== undefined) {
    errorObj.details = error.context;
  }

  if (isDevelopment() && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

/**
 * Domain errors keep their own code; anything else is a general error.
 */
export function errorCodeFor(error: Error): string {
  return isDomainError(error) ? error.code : 'GENERAL_ERROR';
}
