/**
 * Rdeps Command
 *
 * Show packages that depend on a package.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { AppConfig } from '../../config/types.js';
import { createContext, type QueryCommandOptions } from '../context.js';
import { printRendering, renderView } from '../render.js';
import { isBlankInputError, withQueryOptions } from './shared.js';

export function createRdepsCommand(config: AppConfig): Command {
  return withQueryOptions(
    new Command('rdeps')
      .description('Show reverse dependencies (dependents) of a package')
      .argument('<package>', 'Package name')
  ).action(async (pkg: string, options: QueryCommandOptions) => {
    const spinner = ora('Loading reverse dependencies...');

    try {
      const { builder } = createContext(options, config);
      spinner.start();
      const view = await builder.buildReverseView(pkg);

      if (view.status === 'error') {
        spinner.fail(chalk.red('Reverse dependency lookup failed'));
        process.exitCode = 1;
      } else {
        spinner.succeed(`Found ${view.count} dependents`);
      }

      if (options.output === 'json') {
        console.log(JSON.stringify(view, null, 2));
      } else {
        printRendering(renderView(view));
      }
    } catch (error) {
      spinner.stop();
      if (isBlankInputError(error)) return;
      console.error(chalk.red('Failed to load reverse dependencies'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
}
