/**
 * SettingsStore
 *
 * Small JSON settings file tracking first-run state.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { z } from 'zod';

import { silentLogger, type Logger } from '../core/Logger.js';
import type { Settings } from './types.js';

export const SETTINGS_DIR_NAME = 'dep-graph-explorer';

const SettingsSchema = z.object({
  welcomeShown: z.boolean().default(false)
});

const DEFAULT_SETTINGS: Settings = { welcomeShown: false };

export class SettingsStore {
  readonly path: string;

  constructor(configHome: string, private readonly logger: Logger = silentLogger) {
    this.path = join(configHome, SETTINGS_DIR_NAME, 'settings.json');
  }

  /**
   * Missing or unreadable files yield defaults
   */
  load(): Settings {
    if (!existsSync(this.path)) {
      return { ...DEFAULT_SETTINGS };
    }

    try {
      const parsed = SettingsSchema.safeParse(JSON.parse(readFileSync(this.path, 'utf-8')));
      if (parsed.success) {
        return parsed.data;
      }
      this.logger.warn(`Ignoring invalid settings file ${this.path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    } catch (error) {
      this.logger.warn(`Could not read settings file ${this.path}:`, error instanceof Error ? error.message : error);
    }
    return { ...DEFAULT_SETTINGS };
  }

  save(settings: Settings): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(settings, null, 2));
  }

  /**
   * Returns true exactly once: on the first call that finds the welcome unseen.
   */
  consumeFirstRun(): boolean {
    const settings = this.load();
    if (settings.welcomeShown) {
      return false;
    }
    this.save({ ...settings, welcomeShown: true });
    return true;
  }
}
