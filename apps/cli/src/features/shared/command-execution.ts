import type { ContractHost } from '@ftgate/contract';
import { ValidationError, formatZodIssues } from '@ftgate/core';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { openContractRuntime, type OpenContractRuntime } from './contract-runtime.js';
import { emitOutput, renderFailure, renderResult, type OutputFormat, type RenderedOutput } from './output.js';

export interface ContractCommandSpec<TOptions, T> {
  command: string;
  contract: string;
  format: OutputFormat;
  options: TOptions;
  run: (host: ContractHost, options: TOptions) => Promise<Result<T, Error>>;
  formatText?: ((data: T) => string) | undefined;
}

/**
 * Validate raw commander options at the CLI boundary.
 */
export function parseCommandOptions<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  rawOptions: unknown
): Result<T, ValidationError> {
  const parsed = schema.safeParse(rawOptions);
  return parsed.success
    ? ok(parsed.data)
    : err(new ValidationError(formatZodIssues(parsed.error), { operation: 'parse options' }));
}

/**
 * Parse a JSON message argument.
 */
export function parseJsonArgument(raw: string): Result<unknown, ValidationError> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return ok(parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new ValidationError([{ message: `Message is not valid JSON (${message})`, path: '' }]));
  }
}

/**
 * Open the runtime for one contract, run the command against it, and render
 * the outcome. The runtime is always disposed.
 */
export async function runContractCommand<TOptions, T>(
  spec: ContractCommandSpec<TOptions, T>,
  openRuntime: OpenContractRuntime = openContractRuntime
): Promise<RenderedOutput> {
  const runtime = await openRuntime(spec.contract);
  if (runtime.isErr()) {
    return renderFailure(spec.command, runtime.error, spec.format);
  }

  try {
    const result = await spec.run(runtime.value.host, spec.options);
    return renderResult(spec.command, result, spec.format, spec.formatText);
  } finally {
    await runtime.value.dispose();
  }
}

/**
 * Command action body shared by every contract command: validate options,
 * run, write output.
 */
export async function executeContractCommand<TOptions extends { contract: string; json?: boolean | undefined }, T>(
  command: string,
  parsedOptions: Result<TOptions, Error>,
  run: (host: ContractHost, options: TOptions) => Promise<Result<T, Error>>,
  formatText?: (data: T) => string
): Promise<void> {
  if (parsedOptions.isErr()) {
    emitOutput(renderFailure(command, parsedOptions.error, 'text'));
    return;
  }

  const options = parsedOptions.value;
  emitOutput(
    await runContractCommand({
      command,
      contract: options.contract,
      format: options.json ? 'json' : 'text',
      formatText,
      options,
      run,
    })
  );
}
