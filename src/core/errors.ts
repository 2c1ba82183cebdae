/**
 * Custom Error Classes for the dependency explorer
 */

export type ProviderFailureReason = 'not-found' | 'timeout' | 'exit-code' | 'spawn-error';

/**
 * Error describing a failed metadata provider invocation.
 * Carried inside LookupResult; the adapter never throws it to callers.
 */
export class ProviderUnavailableError extends Error {
  public readonly reason: ProviderFailureReason;
  public readonly command: string;
  public readonly exitCode?: number;

  constructor(reason: ProviderFailureReason, command: string, detail?: string, exitCode?: number) {
    super(ProviderUnavailableError.describe(reason, command, detail, exitCode));
    this.name = 'ProviderUnavailableError';
    this.reason = reason;
    this.command = command;
    this.exitCode = exitCode;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProviderUnavailableError);
    }
  }

  private static describe(
    reason: ProviderFailureReason,
    command: string,
    detail?: string,
    exitCode?: number
  ): string {
    switch (reason) {
      case 'not-found':
        return `Provider executable not found: ${command}`;
      case 'timeout':
        return `Provider timed out: ${command}${detail ? ` (${detail})` : ''}`;
      case 'exit-code':
        return `Provider exited with code ${exitCode ?? 'unknown'}: ${command}${detail ? ` - ${detail}` : ''}`;
      case 'spawn-error':
        return `Provider failed to run: ${command}${detail ? ` - ${detail}` : ''}`;
    }
  }
}

/**
 * Error thrown when a blank package name reaches a query
 */
export class EmptyInputError extends Error {
  constructor() {
    super('Package name must not be empty');
    this.name = 'EmptyInputError';
  }
}

/**
 * Error thrown when configuration or a graph file fails validation
 */
export class ConfigError extends Error {
  public readonly source: string;

  constructor(source: string, message: string) {
    super(`Invalid configuration in ${source}: ${message}`);
    this.name = 'ConfigError';
    this.source = source;
  }
}
