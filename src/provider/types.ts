/**
 * Metadata Provider Types
 */

import type { LookupResult, PackageName } from '../core/types.js';

/** Hard limit for a single provider invocation */
export const DEFAULT_PROVIDER_TIMEOUT_MS = 10_000;

export interface MetadataProvider {
  getDirectDependencies(pkg: PackageName, timeoutMs?: number): Promise<LookupResult<PackageName[]>>;
  getReverseDependencies(pkg: PackageName, timeoutMs?: number): Promise<LookupResult<PackageName[]>>;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs: number;
}

/**
 * Runs an external command. Rejects with ProviderUnavailableError on any fault.
 */
export type CommandRunner = (bin: string, args: string[], options: RunOptions) => Promise<CommandOutput>;

export interface ParseResult {
  names: PackageName[];
  /** Lines that matched the expected prefix but could not be parsed */
  anomalies: string[];
}
