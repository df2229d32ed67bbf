import type { Command } from 'commander';

import { executeContractCommand, parseCommandOptions, parseJsonArgument } from '../shared/command-execution.js';
import { ContractCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Register the query command.
 */
export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Run a query, e.g. \'{"type":"tokens","issuer":"core1..."}\'')
    .argument('<message>', 'Query message as JSON')
    .requiredOption('--contract <address>', 'Address of the contract instance')
    .option('--json', 'Output results in JSON format')
    .action(async (rawMessage: string, rawOptions: unknown) => {
      const parsed = parseCommandOptions(ContractCommandOptionsSchema, rawOptions).andThen((options) =>
        parseJsonArgument(rawMessage).map((message) => ({ ...options, message }))
      );
      await executeContractCommand('query', parsed, (host, options) => host.query(options.message));
    });
}
