/**
 * Options and helpers shared by the query commands.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { EmptyInputError } from '../../core/errors.js';
import { parseOutputFormat, parsePositiveInt } from '../context.js';

export function withQueryOptions(command: Command): Command {
  return command
    .option('-o, --output <format>', 'Output format (json, text)', parseOutputFormat, 'text')
    .option('-g, --graph-file <path>', 'Read dependencies from a JSON graph file instead of apt-cache')
    .option('-t, --timeout <ms>', 'Provider timeout per lookup in milliseconds', parsePositiveInt);
}

/**
 * Only the cycle search has a per-package breadth cap
 */
export function withBreadthOption(command: Command): Command {
  return command
    .option('-b, --breadth <n>', 'Dependencies explored per package during cycle search', parsePositiveInt);
}

/**
 * Blank names are a no-op rather than a failure
 */
export function isBlankInputError(error: unknown): boolean {
  if (error instanceof EmptyInputError) {
    console.log(chalk.dim('Enter a package name to query.'));
    return true;
  }
  return false;
}
