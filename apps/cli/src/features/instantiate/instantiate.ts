import type { Command } from 'commander';

import { executeContractCommand, parseCommandOptions } from '../shared/command-execution.js';
import { formatContractResponse } from '../shared/contract-response-format.js';
import { InstantiateCommandOptionsSchema } from '../shared/schemas.js';

import { buildInstantiateMsgFromFlags } from './instantiate-utils.js';

/**
 * Register the instantiate command.
 */
export function registerInstantiateCommand(program: Command): void {
  program
    .command('instantiate')
    .description('Instantiate the contract: record the owner, derive the denom and issue the token')
    .requiredOption('--contract <address>', 'Address of the contract instance')
    .requiredOption('--sender <address>', 'Address of the caller (becomes the owner)')
    .requiredOption('--symbol <symbol>', 'Token symbol')
    .requiredOption('--subunit <subunit>', 'Token subunit (the denom prefix)')
    .requiredOption('--precision <digits>', 'Decimal precision of the token')
    .requiredOption('--initial-amount <amount>', 'Initial supply in subunits')
    .option('--description <text>', 'Token description')
    .option('--features <list>', 'Comma-separated features (minting,freezing,whitelisting,ibc,...)')
    .option('--burn-rate <rate>', 'Burn rate between 0 and 1')
    .option('--send-commission-rate <rate>', 'Send commission rate between 0 and 1')
    .option('--uri <uri>', 'Metadata URI')
    .option('--uri-hash <hash>', 'Metadata URI hash')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeContractCommand(
        'instantiate',
        parseCommandOptions(InstantiateCommandOptionsSchema, rawOptions),
        (host, options) => host.instantiate(options.sender, buildInstantiateMsgFromFlags(options)),
        formatContractResponse
      );
    });
}
