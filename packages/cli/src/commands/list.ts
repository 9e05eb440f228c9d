// packages/cli/src/commands/list.ts

import chalk from 'chalk';

import { EXAMPLES } from '../examples/index.js';

export function listCommand(): void {
  console.log(chalk.bold('Available workflows:\n'));
  const width = Math.max(...EXAMPLES.map((example) => example.name.length));
  for (const example of EXAMPLES) {
    console.log(`  ${chalk.cyan(example.name.padEnd(width))}  ${chalk.gray(example.description)}`);
  }
  console.log(chalk.gray('\nRun one with: taskloom run <workflow>'));
}
