// ---------------------------------------------------------------------------
// PrioBus — Structured Logger
// ---------------------------------------------------------------------------
// Level-filtered console logger with JSON or human-readable lines.
// Components receive a child logger scoped with their own name.
// ---------------------------------------------------------------------------

import type { ILogger } from '../core/types/logger';
import type { LogFormat, LogLevel } from '../core/types/config';

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  prefix?: string;
}

export class Logger implements ILogger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly prefix: string;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.format = options.format;
    this.prefix = options.prefix ?? '';
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit('error', message, error, context);
  }

  child(prefix: string): ILogger {
    return new Logger({
      level: this.level,
      format: this.format,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
    });
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private emit(
    level: LogLevel,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    if (LOG_PRIORITY[level] < LOG_PRIORITY[this.level]) return;

    const timestamp = new Date().toISOString();
    const hasContext = context !== undefined && Object.keys(context).length > 0;

    let line: string;
    if (this.format === 'json') {
      const entry: Record<string, unknown> = { timestamp, level };
      if (this.prefix) entry.module = this.prefix;
      entry.message = message;
      if (hasContext) entry.context = context;
      if (error) {
        entry.error = { name: error.name, message: error.message, stack: error.stack };
      }
      line = JSON.stringify(entry);
    } else {
      const tag = level.toUpperCase().padEnd(5);
      const modulePart = this.prefix ? `[${this.prefix}] ` : '';
      line = `${timestamp} ${tag} ${modulePart}${message}`;
      if (hasContext) line += ` ${JSON.stringify(context)}`;
      if (error) line += `\n  Error: ${error.message}`;
    }

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

/** A logger that discards everything. */
export function createSilentLogger(): ILogger {
  const noop = (): void => {};
  const logger: ILogger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
