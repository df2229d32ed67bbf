import { Command } from 'commander';

import { registerExecuteCommand } from './features/execute/execute.js';
import { registerInstantiateCommand } from './features/instantiate/instantiate.js';
import { registerQueryCommand } from './features/query/query.js';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('ftgate')
    .description('Owner-gated fungible token contract, run locally against a node REST gateway')
    .version('0.1.0');

  registerInstantiateCommand(program);
  registerExecuteCommand(program);
  registerQueryCommand(program);

  return program;
}
