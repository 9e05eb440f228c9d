// packages/cli/src/program.ts — Command definitions

import { VERSION } from '@taskloom/core';
import { Command, InvalidArgumentError } from 'commander';

import { listCommand } from './commands/list.js';
import { runCommand } from './commands/run.js';

function parseMilliseconds(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a non-negative integer');
  return Number.parseInt(value, 10);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('taskloom')
    .description('Run composable task workflows from the terminal')
    .version(VERSION);

  program
    .command('list')
    .description('List the bundled workflows')
    .action(listCommand);

  program
    .command('run')
    .description('Run a bundled workflow and print its report')
    .argument('<workflow>', 'Workflow name (see "taskloom list")')
    .option('--compact', 'Print group and subflow children on one line each', false)
    .option('--hide-outputs', 'Leave outputs out of the report', false)
    .option('--cancel-after <ms>', 'Cancel the run after this many milliseconds', parseMilliseconds)
    .option('--verbose', 'Enable debug logging', false)
    .action(runCommand);

  return program;
}
