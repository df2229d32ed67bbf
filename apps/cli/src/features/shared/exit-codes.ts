import { isDomainError } from '@ftgate/core';

/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments, options or message */
  INVALID_ARGS: 2,

  /** Caller is not the contract owner */
  UNAUTHORIZED: 3,

  /** Contract state missing (not instantiated) */
  NOT_FOUND: 4,

  /** Aggregated query ran past the page limit */
  RESOURCE_EXHAUSTED: 5,

  /** Node unreachable or answered with an error */
  UPSTREAM_FAILURE: 6,

  /** State database could not be opened */
  DATABASE_ERROR: 7,

  /** Contract already instantiated */
  ALREADY_INITIALIZED: 8,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export function exitCodeForError(error: Error): ExitCode {
  if (!isDomainError(error)) {
    return ExitCodes.GENERAL_ERROR;
  }

  switch (error.code) {
    case 'VALIDATION_ERROR':
      return ExitCodes.INVALID_ARGS;
    case 'UNAUTHORIZED':
      return ExitCodes.UNAUTHORIZED;
    case 'NOT_FOUND':
      return ExitCodes.NOT_FOUND;
    case 'RESOURCE_EXHAUSTED':
      return ExitCodes.RESOURCE_EXHAUSTED;
    case 'UPSTREAM_FAILURE':
      return ExitCodes.UPSTREAM_FAILURE;
    case 'ALREADY_INITIALIZED':
      return ExitCodes.ALREADY_INITIALIZED;
    default: {
      const _exhaustive: never = error.code;
      return _exhaustive;
    }
  }
}
