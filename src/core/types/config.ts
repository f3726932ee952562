// ---------------------------------------------------------------------------
// PrioBus — Configuration Types
// ---------------------------------------------------------------------------

/**
 * Root configuration shape loaded from YAML.
 */
export interface PrioBusConfig {
  dispatcher: DispatcherConfig;
  logging: LoggingConfig;
}

/** What `processEvents()` does when a handler throws. */
export type HandlerErrorPolicy = 'isolate' | 'propagate';

export interface DispatcherConfig {
  /**
   * Upper bound on events processed by one drain. `0` disables the
   * bound, and a handler that keeps re-enqueueing then never lets the
   * drain return.
   */
  maxEventsPerDrain: number;

  /**
   * `isolate` logs the failure and keeps invoking the remaining handlers.
   * `propagate` discards the event and rethrows as `HandlerError`.
   */
  handlerErrors: HandlerErrorPolicy;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'text';

export interface LoggingConfig {
  /** Minimum severity to emit. */
  level: LogLevel;

  format: LogFormat;
}
