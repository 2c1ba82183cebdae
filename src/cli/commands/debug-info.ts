/**
 * Debug Info Command
 *
 * Print version and environment details for bug reports.
 */

import { Command } from 'commander';
import { release, type as osType } from 'os';

import type { AppConfig } from '../../config/types.js';
import { APP_NAME, VERSION } from '../../version.js';

export function collectDebugInfo(config: AppConfig): string[] {
  return [
    `${APP_NAME} ${VERSION}`,
    `Node ${process.version}`,
    `OS: ${osType()} ${release()}`,
    `Provider: ${config.providerBin} (timeout ${config.timeoutMs}ms, breadth ${config.breadthCap})`
  ];
}

export function createDebugInfoCommand(config: AppConfig): Command {
  return new Command('debug-info')
    .description('Print version and environment details')
    .action(() => {
      for (const line of collectDebugInfo(config)) {
        console.log(line);
      }
    });
}
