/**
 * Cycles Command
 *
 * Search for circular dependency chains reachable from a package.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { AppConfig } from '../../config/types.js';
import { createContext, parsePositiveInt, type QueryCommandOptions } from '../context.js';
import { printRendering, renderCycles } from '../render.js';
import { isBlankInputError, withBreadthOption, withQueryOptions } from './shared.js';

export function createCyclesCommand(config: AppConfig): Command {
  return withBreadthOption(withQueryOptions(
    new Command('cycles')
      .description('Find circular dependencies reachable from a package')
      .argument('<package>', 'Package name')
  ))
    .option('-d, --max-depth <n>', 'Maximum path length to follow (default: unbounded)', parsePositiveInt)
    .option('-x, --exhaustive', 'Re-expand packages reached through another parent (slow)', false)
    .action(async (pkg: string, options: QueryCommandOptions) => {
      const spinner = ora('Checking for circular dependencies...');

      try {
        const { detector } = createContext(options, config);
        spinner.start();
        const report = await detector.detect(pkg);

        if (report.status === 'error') {
          spinner.fail(chalk.red('Dependency lookup failed'));
          process.exitCode = 1;
        } else if (report.cycles.length > 0) {
          spinner.warn(chalk.yellow(`${report.cycles.length} circular dependencies`));
        } else {
          spinner.succeed('No circular dependencies');
        }

        if (options.output === 'json') {
          console.log(JSON.stringify(report, null, 2));
        } else {
          printRendering(renderCycles(report));
        }
      } catch (error) {
        spinner.stop();
        if (isBlankInputError(error)) return;
        console.error(chalk.red('Cycle search failed'));
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
