import { isDevelopment } from '@ftgate/env';
import type { Result } from 'neverthrow';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, errorCodeFor } from './cli-response.js';
import { exitCodeForError, ExitCodes, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

/**
 * What a finished command writes and how the process should exit.
 */
export interface RenderedOutput {
  exitCode: ExitCode;
  stdout?: string | undefined;
  stderr?: string | undefined;
}

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  VALIDATION_ERROR: 'Check the message and options. Run with --help for usage information.',
  UNAUTHORIZED: 'Only the contract owner can run this message. Pass the owner address with --sender.',
  NOT_FOUND: 'The contract has no state yet. Run `ftgate instantiate` for this --contract first.',
  UPSTREAM_FAILURE: 'Check that FTGATE_NODE_URL points at a reachable node REST gateway.',
  RESOURCE_EXHAUSTED: 'Raise FTGATE_MAX_QUERY_PAGES if the result set is expected to be this large.',
};

export function renderSuccess<T>(
  command: string,
  data: T,
  format: OutputFormat,
  formatText: (data: T) => string = formatJson
): RenderedOutput {
  const stdout =
    format === 'json' ? JSON.stringify(createSuccessResponse(command, data), undefined, 2) : formatText(data);
  return { exitCode: ExitCodes.SUCCESS, stdout };
}

/**
 * JSON mode writes the error envelope to stdout so callers can parse it;
 * text mode writes a message and a tip to stderr.
 */
export function renderFailure(command: string, error: Error, format: OutputFormat): RenderedOutput {
  const exitCode = exitCodeForError(error);

  if (format === 'json') {
    return { exitCode, stdout: JSON.stringify(createErrorResponse(command, error), undefined, 2) };
  }

  const lines = [`${pc.red('✗')} Error: ${error.message}`];
  const tip = ERROR_TIPS[errorCodeFor(error)];
  if (tip) {
    lines.push(pc.dim(tip));
  }
  if (isDevelopment() && error.stack) {
    lines.push(pc.dim(error.stack));
  }
  return { exitCode, stderr: lines.join('\n') };
}

export function renderResult<T>(
  command: string,
  result: Result<T, Error>,
  format: OutputFormat,
  formatText?: (data: T) => string
): RenderedOutput {
  return result.isOk()
    ? renderSuccess(command, result.value, format, formatText)
    : renderFailure(command, result.error, format);
}

/**
 * Write rendered output. Sets `process.exitCode` rather than exiting so
 * database handles close normally.
 */
export function emitOutput(output: RenderedOutput): void {
  if (output.stdout !== undefined) {
    process.stdout.write(`${output.stdout}\n`);
  }
  if (output.stderr !== undefined) {
    process.stderr.write(`${output.stderr}\n`);
  }
  process.exitCode = output.exitCode;
}

function formatJson(data: unknown): string {
  return JSON.stringify(data, undefined, 2);
}
