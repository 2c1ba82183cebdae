/**
 * Configuration Types
 */

import type { LogLevel } from '../core/Logger.js';

export interface AppConfig {
  /** Provider executable */
  providerBin: string;
  /** Hard limit per provider call in milliseconds */
  timeoutMs: number;
  /** Dependencies explored per node during cycle search */
  breadthCap: number;
  logLevel: LogLevel;
  /** Base directory for the settings file (XDG_CONFIG_HOME) */
  configHome: string;
}

export interface Settings {
  welcomeShown: boolean;
}
