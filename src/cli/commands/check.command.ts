import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';

import type { ContractRegistry } from '../../contracts/registry.js';
import type { RawKeywords } from '../../contracts/types.js';
import { isTextContractsError, isViolation } from '../../shared/errors/index.js';
import { parseJsonArgs, parseJsonKwargs, renderBundle } from '../json-input.js';
import type { CliOutput } from '../io.js';

type CheckCommandOptions = {
  args?: unknown[];
  kwargs?: RawKeywords;
  quiet?: boolean;
};

/** Exit codes of the check command */
export const CHECK_EXIT = {
  PASSED: 0,
  VIOLATION: 1,
  USAGE: 2,
} as const;

/**
 * Check one call against its contract and report the outcome
 */
export function runCheck(
  registry: ContractRegistry,
  operation: string,
  options: CheckCommandOptions,
  io: CliOutput
): number {
  try {
    const bundle = registry.check(operation, options.args ?? [], options.kwargs ?? {});
    io.out(chalk.green(`✓ ${operation} passed`));
    if (!options.quiet) {
      io.out(renderBundle(bundle));
    }
    return CHECK_EXIT.PASSED;
  } catch (error) {
    if (isViolation(error)) {
      io.err(chalk.red(`✗ ${operation} rejected [${error.code}]`));
      io.err(error.message);
      return CHECK_EXIT.VIOLATION;
    }
    if (isTextContractsError(error)) {
      io.err(chalk.red(error.message));
      return CHECK_EXIT.USAGE;
    }
    throw error;
  }
}

type RawCheckOptions = {
  args?: string;
  kwargs?: string;
  quiet?: boolean;
};

/**
 * Parse the JSON options, then check. Malformed JSON is a usage error.
 */
export function runCheckCommand(
  registry: ContractRegistry,
  operation: string,
  raw: RawCheckOptions,
  io: CliOutput
): number {
  let options: CheckCommandOptions;
  try {
    options = {
      args: raw.args === undefined ? undefined : parseJsonArgs(raw.args),
      kwargs: raw.kwargs === undefined ? undefined : parseJsonKwargs(raw.kwargs),
      quiet: raw.quiet,
    };
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      io.err(chalk.red(error.message));
      return CHECK_EXIT.USAGE;
    }
    throw error;
  }
  return runCheck(registry, operation, options, io);
}

export function registerCheckCommand(program: Command, registry: ContractRegistry, io: CliOutput): void {
  program
    .command('check')
    .description('Validate a call to an operation without running it')
    .argument('<operation>', 'Operation name (see `list`)')
    .option('-a, --args <json>', 'Positional arguments as a JSON array')
    .option('-k, --kwargs <json>', 'Keyword arguments as a JSON object')
    .option('-q, --quiet', 'Do not print the validated arguments')
    .action((operation: string, options: RawCheckOptions) => {
      const code = runCheckCommand(registry, operation, options, io);
      if (code !== CHECK_EXIT.PASSED) {
        process.exitCode = code;
      }
    });
}
