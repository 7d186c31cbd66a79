import type { Logger, LoggerMeta } from './types';

/**
 * Console logger implementation.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta ?? {});
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta ?? {});
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta ?? {});
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta ?? {});
  }
}

export interface CreateLoggerOptions {
  /** Pass debug records through. Off by default. */
  debug?: boolean;
  /** Sink to write to; defaults to ConsoleLogger. */
  logger?: Logger;
}

/**
 * Wraps a sink so that debug records are only written when debugging is on.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const sink = options.logger ?? new ConsoleLogger();
  const debugEnabled = options.debug ?? false;

  return {
    debug: (message, meta) => {
      if (debugEnabled) {
        sink.debug(message, meta);
      }
    },
    info: (message, meta) => sink.info(message, meta),
    warn: (message, meta) => sink.warn(message, meta),
    error: (message, meta) => sink.error(message, meta),
  };
}
