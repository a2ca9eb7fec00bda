/**
 * Subsystem Logging
 *
 * Thin wrapper over tslog that hands every component a named child logger.
 * Call sites pass a message and an optional metadata object.
 */

import { Logger, type ILogObj } from 'tslog';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// tslog numeric levels
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
}

function resolveOutputType(): 'pretty' | 'json' | 'hidden' {
  if (process.env.VITEST) {
    return 'hidden';
  }
  return process.stdout.isTTY ? 'pretty' : 'json';
}

const rootLogger = new Logger<ILogObj>({
  name: 'status-display',
  type: resolveOutputType(),
  minLevel: LOG_LEVELS[parseLogLevel(process.env.STATUS_DISPLAY_LOG_LEVEL)],
});

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = rootLogger.getSubLogger({ name: subsystem });
  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    const args: unknown[] = meta ? [message, meta] : [message];
    switch (level) {
      case 'debug':
        logger.debug(...args);
        break;
      case 'info':
        logger.info(...args);
        break;
      case 'warn':
        logger.warn(...args);
        break;
      case 'error':
        logger.error(...args);
        break;
    }
  };

  return {
    subsystem,
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
