import type { Command } from 'commander';

import { executeContractCommand, parseCommandOptions, parseJsonArgument } from '../shared/command-execution.js';
import { formatContractResponse } from '../shared/contract-response-format.js';
import { SenderCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Register the execute command.
 */
export function registerExecuteCommand(program: Command): void {
  program
    .command('execute')
    .description('Execute a message, e.g. \'{"type":"mint","amount":"1000"}\'')
    .argument('<message>', 'Execute message as JSON')
    .requiredOption('--contract <address>', 'Address of the contract instance')
    .requiredOption('--sender <address>', 'Address of the caller')
    .option('--json', 'Output results in JSON format')
    .action(async (rawMessage: string, rawOptions: unknown) => {
      const parsed = parseCommandOptions(SenderCommandOptionsSchema, rawOptions).andThen((options) =>
        parseJsonArgument(rawMessage).map((message) => ({ ...options, message }))
      );
      await executeContractCommand(
        'execute',
        parsed,
        (host, options) => host.execute(options.sender, options.message),
        formatContractResponse
      );
    });
}
