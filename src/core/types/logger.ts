// ---------------------------------------------------------------------------
// PrioBus — Logger Interface
// ---------------------------------------------------------------------------

/**
 * Structured logger. Components receive a child logger prefixed with
 * their own name.
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  child(prefix: string): ILogger;
}
