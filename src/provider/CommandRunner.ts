/**
 * CommandRunner
 *
 * Spawns the provider tool and collects its output under a hard timeout.
 */

import { spawn } from 'child_process';

import { ProviderUnavailableError } from '../core/errors.js';
import type { CommandOutput, RunOptions } from './types.js';

export function runCommand(bin: string, args: string[], options: RunOptions): Promise<CommandOutput> {
  const command = [bin, ...args].join(' ');

  return new Promise((resolve, reject) => {
    const child = spawn(bin, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, LC_ALL: 'C' }
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (outcome: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      outcome();
    };

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      finish(() => reject(new ProviderUnavailableError('timeout', command, `${options.timeoutMs}ms`)));
    }, options.timeoutMs);

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      finish(() => reject(
        error.code === 'ENOENT'
          ? new ProviderUnavailableError('not-found', command)
          : new ProviderUnavailableError('spawn-error', command, error.message)
      ));
    });

    child.on('close', (code) => {
      finish(() => {
        if (code === 0) {
          resolve({ stdout, stderr });
        } else {
          reject(new ProviderUnavailableError('exit-code', command, stderr.trim() || undefined, code ?? undefined));
        }
      });
    });
  });
}
