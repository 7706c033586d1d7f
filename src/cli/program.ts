import { Command } from 'commander';

import { createDefaultRegistry, type ContractRegistry } from '../contracts/registry.js';
import { registerCheckCommand } from './commands/check.command.js';
import { registerListCommand } from './commands/list.command.js';
import { processOutput, type CliOutput } from './io.js';

export const VERSION = '0.1.0';

export function createProgram(
  io: CliOutput = processOutput,
  registry: ContractRegistry = createDefaultRegistry()
): Command {
  const program = new Command();

  program
    .name('text-contracts')
    .description('Inspect and exercise argument contracts of text operations')
    .version(VERSION);

  registerListCommand(program, registry, io);
  registerCheckCommand(program, registry, io);

  return program;
}
