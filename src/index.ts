/**
 * dep-graph-explorer
 *
 * Direct dependencies, reverse dependencies and circular dependency search
 * over an external package metadata provider.
 */

export * from './core/types.js';
export { ProviderUnavailableError, EmptyInputError, ConfigError } from './core/errors.js';
export type { ProviderFailureReason } from './core/errors.js';
export { normalizePackageName, requirePackageName } from './core/packageName.js';
export { createLogger, silentLogger, LOG_LEVELS } from './core/Logger.js';
export type { Logger, LogLevel } from './core/Logger.js';

export { AptCacheProvider } from './provider/AptCacheProvider.js';
export type { AptCacheProviderOptions } from './provider/AptCacheProvider.js';
export { StaticGraphProvider } from './provider/StaticGraphProvider.js';
export type { GraphFile } from './provider/StaticGraphProvider.js';
export { runCommand } from './provider/CommandRunner.js';
export { parseDependsOutput, parseRdependsOutput } from './provider/parsers.js';
export { DEFAULT_PROVIDER_TIMEOUT_MS } from './provider/types.js';
export type { MetadataProvider, CommandRunner, CommandOutput, RunOptions, ParseResult } from './provider/types.js';

export { DependencyGraph } from './graph/DependencyGraph.js';
export { DependencyGraphBuilder } from './graph/DependencyGraphBuilder.js';
export { CycleDetector } from './graph/CycleDetector.js';
export { DEFAULT_BREADTH_CAP } from './graph/types.js';
export type { CycleDetectorOptions, GraphBuilderOptions } from './graph/types.js';

export { QuerySession, QUERY_KINDS } from './session/QuerySession.js';
export type { QueryKind, QueryResult, QueryStarted, QueryCompleted, QueryFailed } from './session/QuerySession.js';

export { loadConfig, parseConfig } from './config/ConfigLoader.js';
export { SettingsStore } from './config/SettingsStore.js';
export type { AppConfig, Settings } from './config/types.js';

export { VERSION } from './version.js';
