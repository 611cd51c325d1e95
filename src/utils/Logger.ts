import type { LogLevel } from '../types/index.js';

/**
 * Log entry with metadata.
 */
export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Receives every entry that passes the level filter.
 */
export type LogSink = (entry: LogEntry) => void;

/**
 * Logger interface shared by the generator, renderer and web server.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(context: string): ILogger;
}

/**
 * Log level priority for filtering.
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Writes an entry to the console as `<timestamp> <LEVEL> [context] message`.
 */
export const consoleSink: LogSink = (entry) => {
  const prefix = entry.context ? `[${entry.context}] ` : '';
  const line = `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)} ${prefix}${entry.message}`;
  const args: unknown[] = entry.data ? [line, entry.data] : [line];

  switch (entry.level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
};

/**
 * Level-filtered logger with hierarchical context.
 */
export class Logger implements ILogger {
  private readonly levelPriority: number;

  constructor(
    private readonly level: LogLevel = 'warn',
    private readonly context?: string,
    private readonly sink: LogSink = consoleSink
  ) {
    this.levelPriority = LOG_LEVEL_PRIORITY[level];
  }

  /**
   * Creates a child logger; contexts are joined with ':'.
   */
  child(context: string): ILogger {
    const fullContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(this.level, fullContext, this.sink);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogEntry['level'], message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < this.levelPriority) {
      return;
    }

    this.sink({
      level,
      message,
      context: this.context,
      data,
      timestamp: new Date(),
    });
  }
}

/**
 * Creates a logger. 'silent' filters out every level.
 */
export function createLogger(level: LogLevel = 'warn', context?: string, sink?: LogSink): ILogger {
  return new Logger(level, context, sink);
}
