/**
 * Deps Command
 *
 * Show direct dependencies of a package with one level of lookahead.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { AppConfig } from '../../config/types.js';
import { createContext, type QueryCommandOptions } from '../context.js';
import { printRendering, renderView } from '../render.js';
import { isBlankInputError, withQueryOptions } from './shared.js';

export function createDepsCommand(config: AppConfig): Command {
  return withQueryOptions(
    new Command('deps')
      .description('Show direct dependencies of a package')
      .argument('<package>', 'Package name')
  ).action(async (pkg: string, options: QueryCommandOptions) => {
    const spinner = ora(`Loading dependencies for ${pkg.trim()}...`);

    try {
      const { builder } = createContext(options, config);
      spinner.start();
      const view = await builder.buildDependencyView(pkg);

      if (view.status === 'error') {
        spinner.fail(chalk.red('Dependency lookup failed'));
        process.exitCode = 1;
      } else {
        spinner.succeed(`Found ${view.count} dependencies`);
      }

      if (options.output === 'json') {
        console.log(JSON.stringify(view, null, 2));
      } else {
        printRendering(renderView(view));
      }
    } catch (error) {
      spinner.stop();
      if (isBlankInputError(error)) return;
      console.error(chalk.red('Failed to load dependencies'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
}
