/**
 * AptCacheProvider
 *
 * Metadata provider backed by the `apt-cache` tool. Every fault of the tool
 * (missing binary, timeout, non-zero exit) comes back as a failed LookupResult.
 */

import { ProviderUnavailableError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/Logger.js';
import type { LookupResult, PackageName } from '../core/types.js';
import { runCommand } from './CommandRunner.js';
import { parseDependsOutput, parseRdependsOutput } from './parsers.js';
import {
  DEFAULT_PROVIDER_TIMEOUT_MS,
  type CommandRunner,
  type MetadataProvider,
  type ParseResult
} from './types.js';

export interface AptCacheProviderOptions {
  /** Executable to invoke (default: apt-cache) */
  bin?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

export class AptCacheProvider implements MetadataProvider {
  private readonly bin: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(options: AptCacheProviderOptions = {}) {
    this.bin = options.bin ?? 'apt-cache';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? silentLogger;
  }

  async getDirectDependencies(pkg: PackageName, timeoutMs?: number): Promise<LookupResult<PackageName[]>> {
    return this.query('depends', pkg, parseDependsOutput, timeoutMs);
  }

  async getReverseDependencies(pkg: PackageName, timeoutMs?: number): Promise<LookupResult<PackageName[]>> {
    return this.query('rdepends', pkg, parseRdependsOutput, timeoutMs);
  }

  private async query(
    subcommand: 'depends' | 'rdepends',
    pkg: PackageName,
    parse: (output: string) => ParseResult,
    timeoutMs?: number
  ): Promise<LookupResult<PackageName[]>> {
    let stdout: string;
    try {
      ({ stdout } = await this.runner(this.bin, [subcommand, pkg], {
        timeoutMs: timeoutMs ?? this.timeoutMs
      }));
    } catch (error) {
      const failure = error instanceof ProviderUnavailableError
        ? error
        : new ProviderUnavailableError(
            'spawn-error',
            `${this.bin} ${subcommand} ${pkg}`,
            error instanceof Error ? error.message : String(error)
          );
      this.logger.warn(failure.message);
      return { ok: false, error: failure };
    }

    const { names, anomalies } = parse(stdout);
    for (const line of anomalies) {
      this.logger.debug(`Skipped unparseable ${subcommand} line for ${pkg}: ${JSON.stringify(line)}`);
    }
    this.logger.debug(`${subcommand} ${pkg}: ${names.length} entries`);

    return { ok: true, value: names };
  }
}
