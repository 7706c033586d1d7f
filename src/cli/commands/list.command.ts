import type { Command } from 'commander';
import chalk from 'chalk';

import type { ContractRegistry } from '../../contracts/registry.js';
import type { CliOutput } from '../io.js';

export function runList(registry: ContractRegistry, io: CliOutput): number {
  for (const operation of registry.list()) {
    const contract = registry.get(operation);
    io.out(`${chalk.bold(registry.describe(operation))}`);
    io.out(chalk.gray(`  ${contract.description}`));
  }
  return 0;
}

export function registerListCommand(program: Command, registry: ContractRegistry, io: CliOutput): void {
  program
    .command('list')
    .description('List every guarded operation with its parameters')
    .action(() => {
      runList(registry, io);
    });
}
