/**
 * Logger
 *
 * Tagged console logging on stderr. Stdout stays reserved for command output.
 */

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(private readonly tag: string, level: LogLevel) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  error(message: string, ...details: unknown[]): void {
    this.write('error', message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write('warn', message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write('info', message, details);
  }

  debug(message: string, ...details: unknown[]): void {
    this.write('debug', message, details);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void {
    if (LOG_LEVELS.indexOf(level) > this.threshold) {
      return;
    }
    console.error(`[${this.tag}] ${message}`, ...details);
  }
}

export function createLogger(tag: string, level: LogLevel = 'warn'): Logger {
  return new ConsoleLogger(tag, level);
}

export const silentLogger: Logger = createLogger('silent', 'silent');
