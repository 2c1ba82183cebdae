/**
 * CLI Context
 *
 * Wires configuration, provider, graph builder and cycle detector for a
 * command invocation.
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';

import { loadConfig } from '../config/ConfigLoader.js';
import { SettingsStore } from '../config/SettingsStore.js';
import type { AppConfig } from '../config/types.js';
import { createLogger, type Logger } from '../core/Logger.js';
import { CycleDetector } from '../graph/CycleDetector.js';
import { DependencyGraphBuilder } from '../graph/DependencyGraphBuilder.js';
import type { CycleDetectorOptions } from '../graph/types.js';
import { AptCacheProvider } from '../provider/AptCacheProvider.js';
import { StaticGraphProvider } from '../provider/StaticGraphProvider.js';
import type { MetadataProvider } from '../provider/types.js';

export type OutputFormat = 'text' | 'json';

export interface QueryCommandOptions {
  output: OutputFormat;
  graphFile?: string;
  timeout?: number;
  breadth?: number;
  maxDepth?: number;
  exhaustive?: boolean;
}

export interface CliContext {
  config: AppConfig;
  logger: Logger;
  provider: MetadataProvider;
  builder: DependencyGraphBuilder;
  detector: CycleDetector;
}

export function createContext(options: QueryCommandOptions, config: AppConfig): CliContext {
  const logger = createLogger('depgraph', config.logLevel);
  const timeoutMs = options.timeout ?? config.timeoutMs;

  const provider: MetadataProvider = options.graphFile
    ? StaticGraphProvider.fromFile(options.graphFile)
    : new AptCacheProvider({
        bin: config.providerBin,
        timeoutMs,
        logger: createLogger('Provider', config.logLevel)
      });

  const detectorOptions: CycleDetectorOptions = {
    breadthCap: options.breadth ?? config.breadthCap,
    maxDepth: options.maxDepth,
    exhaustive: options.exhaustive ?? false,
    timeoutMs
  };

  return {
    config,
    logger,
    provider,
    builder: new DependencyGraphBuilder(provider, { timeoutMs }, logger),
    detector: new CycleDetector(provider, detectorOptions, logger)
  };
}

/**
 * Load configuration once for the whole invocation. An invalid environment is
 * reported and yields undefined.
 */
export function loadCliConfig(load: () => AppConfig = loadConfig): AppConfig | undefined {
  try {
    return load();
  } catch (error) {
    console.error(chalk.red('Invalid configuration'));
    console.error(error instanceof Error ? error.message : error);
    return undefined;
  }
}

export function createSettingsStore(config: AppConfig): SettingsStore {
  return new SettingsStore(config.configHome, createLogger('Settings', config.logLevel));
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value !== 'text' && value !== 'json') {
    throw new InvalidArgumentError('Expected "text" or "json".');
  }
  return value;
}
