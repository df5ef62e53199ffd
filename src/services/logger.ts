import pino from 'pino';
import { ResultAsync } from 'neverthrow';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export interface LoggerConfig {
  level?: LogLevel;
  // File path; stderr when omitted so stdout stays reserved for task output
  destination?: string;
  sync?: boolean;
}

class Logger {
  private pinoLogger: pino.Logger;
  private destination: string | number;

  constructor(config: LoggerConfig = {}) {
    this.destination = config.destination ?? 2;

    this.pinoLogger = pino({
      level: config.level ?? 'info',
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    }, pino.destination({
      dest: this.destination,
      sync: config.sync ?? false,
      mkdir: typeof this.destination === 'string',
    }));
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.debug({ context, data }, message);
  }

  info(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.info({ context, data }, message);
  }

  warn(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.warn({ context, data }, message);
  }

  error(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.error({ context, data }, message);
  }

  getDestination(): string | number {
    return this.destination;
  }

  // Flush any pending writes
  close(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(
      new Promise<void>((resolve, reject) => {
        this.pinoLogger.flush((error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
      (error) => ({ message: error instanceof Error ? error.message : 'Failed to flush logger' })
    );
  }
}

// Singleton logger instance; library callers that never initialize it get silence
let globalLogger: Logger | null = null;

export function initializeLogger(config: LoggerConfig = {}): ResultAsync<Logger, { message: string }> {
  return ResultAsync.fromPromise(
    Promise.resolve().then(() => new Logger(config)),
    (error) => ({
      message: `Logger initialization failed: ${error instanceof Error ? error.message : String(error)}`,
    })
  ).map(logger => {
    globalLogger = logger;
    return logger;
  });
}

export function getLogger(): Logger | null {
  return globalLogger;
}

export function resetLogger(): void {
  globalLogger = null;
}

// Convenience functions for logging
export const log = {
  debug: (message: string, context?: string, data?: unknown) => globalLogger?.debug(message, context, data),
  info: (message: string, context?: string, data?: unknown) => globalLogger?.info(message, context, data),
  warn: (message: string, context?: string, data?: unknown) => globalLogger?.warn(message, context, data),
  error: (message: string, context?: string, data?: unknown) => globalLogger?.error(message, context, data),
};

export { Logger };
