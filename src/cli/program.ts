/**
 * depgraph program
 *
 * Builds the commander program around a configuration loaded once.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { AppConfig } from '../config/types.js';
import { VERSION } from '../version.js';
import { createSettingsStore } from './context.js';
import { createCyclesCommand } from './commands/cycles.js';
import { createDebugInfoCommand } from './commands/debug-info.js';
import { createDepsCommand } from './commands/deps.js';
import { createRdepsCommand } from './commands/rdeps.js';
import { createShellCommand } from './commands/shell.js';

function showWelcome(): void {
  console.log(chalk.cyan('Welcome to depgraph'));
  console.log(chalk.dim('─'.repeat(40)));
  console.log('Explore package dependency trees:');
  console.log('  ✓ Direct dependencies      depgraph deps <package>');
  console.log('  ✓ Reverse dependencies     depgraph rdeps <package>');
  console.log('  ✓ Circular dependencies    depgraph cycles <package>');
  console.log('  ✓ Interactive exploration  depgraph shell');
  console.log();
}

export function createProgram(config: AppConfig): Command {
  const program = new Command();
  const settings = createSettingsStore(config);

  program
    .name('depgraph')
    .description('Explore direct and reverse dependencies of Debian packages and find circular chains')
    .version(VERSION);

  program.hook('preAction', (_program, actionCommand) => {
    if (actionCommand.opts().output === 'json') {
      return;
    }
    try {
      if (settings.consumeFirstRun()) {
        showWelcome();
      }
    } catch (error) {
      console.error(chalk.yellow('Could not update settings:'), error instanceof Error ? error.message : error);
    }
  });

  program.addCommand(createDepsCommand(config));
  program.addCommand(createRdepsCommand(config));
  program.addCommand(createCyclesCommand(config));
  program.addCommand(createShellCommand(config));
  program.addCommand(createDebugInfoCommand(config));

  return program;
}
