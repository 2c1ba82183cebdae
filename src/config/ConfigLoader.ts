/**
 * Configuration Loader
 *
 * Reads `.env` and the process environment once at startup and validates the
 * result into an AppConfig that is passed to constructors explicitly.
 */

import { config as loadDotenv } from 'dotenv';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

import { ConfigError } from '../core/errors.js';
import { LOG_LEVELS } from '../core/Logger.js';
import { DEFAULT_BREADTH_CAP } from '../graph/types.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../provider/types.js';
import type { AppConfig } from './types.js';

const LogLevelSchema = z.enum(LOG_LEVELS);

const EnvSchema = z.object({
  DEPGRAPH_PROVIDER_BIN: z.string().min(1).default('apt-cache'),
  DEPGRAPH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PROVIDER_TIMEOUT_MS),
  DEPGRAPH_BREADTH_CAP: z.coerce.number().int().positive().default(DEFAULT_BREADTH_CAP),
  DEPGRAPH_LOG_LEVEL: LogLevelSchema.default('warn'),
  XDG_CONFIG_HOME: z.string().min(1).optional()
});

export interface LoadConfigOptions {
  /** Path of a .env file to load first (default: ./.env when present) */
  envPath?: string;
  /** Skip dotenv entirely */
  skipDotenv?: boolean;
}

/**
 * Build an AppConfig from an environment map. Blank values count as unset.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      'environment',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    );
  }

  return {
    providerBin: parsed.data.DEPGRAPH_PROVIDER_BIN,
    timeoutMs: parsed.data.DEPGRAPH_TIMEOUT_MS,
    breadthCap: parsed.data.DEPGRAPH_BREADTH_CAP,
    logLevel: parsed.data.DEPGRAPH_LOG_LEVEL,
    configHome: parsed.data.XDG_CONFIG_HOME ?? join(homedir(), '.config')
  };
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  if (!options.skipDotenv) {
    loadDotenv(options.envPath ? { path: options.envPath } : {});
  }
  return parseConfig(process.env);
}
