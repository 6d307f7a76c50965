/**
 * Scoped logging for utility modules
 *
 * Each module creates its own logger with `createUtilLogger('Scope')`. Entries
 * below the configured minimum level are dropped before reaching the sink.
 */

import type { LogEntry, LogLevel, LogSink } from '@streamcore/types';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface UtilLogger {
  readonly scope: string;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggingOptions {
  minimumLevel?: LogLevel;
  sink?: LogSink;
}

/**
 * Format an entry as a single console line
 */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  let line = `${timestamp} ${entry.level.toUpperCase()} [${entry.scope}] ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ` ${JSON.stringify(entry.data, serializeValue)}`;
  }

  return line;
}

function serializeValue(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function createConsoleSink(): LogSink {
  return {
    write(entry) {
      const line = formatLogEntry(entry);
      switch (entry.level) {
        case 'debug':
          console.debug(line);
          break;
        case 'info':
          console.info(line);
          break;
        case 'warn':
          console.warn(line);
          break;
        case 'error':
          console.error(line);
          break;
      }
    },
  };
}

export function createNullSink(): LogSink {
  return {
    write() {},
  };
}

/**
 * Fan an entry out to several sinks
 */
export function createCompositeSink(sinks: LogSink[]): LogSink {
  return {
    write(entry) {
      sinks.forEach(sink => sink.write(entry));
    },
  };
}

let minimumLevel: LogLevel = 'info';
let activeSink: LogSink = createConsoleSink();

export function configureLogging(options: LoggingOptions): void {
  if (options.minimumLevel) {
    minimumLevel = options.minimumLevel;
  }
  if (options.sink) {
    activeSink = options.sink;
  }
}

export function resetLogging(): void {
  minimumLevel = 'info';
  activeSink = createConsoleSink();
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minimumLevel];
}

export function createUtilLogger(scope: string): UtilLogger {
  const write = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (!isLevelEnabled(level)) return;

    const entry: LogEntry = { timestamp: Date.now(), level, scope, message };
    if (data !== undefined) {
      entry.data = data;
    }
    activeSink.write(entry);
  };

  return {
    scope,
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}
