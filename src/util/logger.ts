/**
 * Module-tagged logger writing to stderr.
 *
 * ```typescript
 * const logger = getLogger('table');
 * logger.debug(() => ['Loaded', count, 'records']);
 * ```
 *
 * Messages below the global level are dropped; a function argument is only
 * called when the message is going to be written.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface LogSink {
  write(line: string): unknown;
}

let globalLevel: LogLevel = 'warn';
let sink: LogSink = process.stderr;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

export function setLogSink(next: LogSink): void {
  sink = next;
}

function formatArg(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.stack ?? value.message;
  return JSON.stringify(value) ?? String(value);
}

export class Logger {
  constructor(readonly module: string) {}

  private emit(level: Exclude<LogLevel, 'silent'>, args: unknown[]): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(globalLevel)) return;
    let values = args;
    let first = args[0];
    if (args.length === 1 && typeof first === 'function') {
      let result: unknown = first();
      values = Array.isArray(result) ? result : [result];
    }
    sink.write(`[${level.toUpperCase()}][${this.module}] ` +
      values.map(formatArg).join(' ') + '\n');
  }

  debug(...args: unknown[]): void {
    this.emit('debug', args);
  }

  info(...args: unknown[]): void {
    this.emit('info', args);
  }

  warn(...args: unknown[]): void {
    this.emit('warn', args);
  }

  error(...args: unknown[]): void {
    this.emit('error', args);
  }
}

const loggers = new Map<string, Logger>();

export function getLogger(module: string): Logger {
  let logger = loggers.get(module);
  if (logger == null) {
    logger = new Logger(module);
    loggers.set(module, logger);
  }
  return logger;
}
