// ---------------------------------------------------------------------------
// PrioBus — Shared Error Types
// ---------------------------------------------------------------------------
// Missing handler sets and removals of unknown handlers are not errors.
// These types cover bad input, configuration problems and drain hazards.
// ---------------------------------------------------------------------------

/**
 * Base class for all PrioBus errors.
 * Preserves the original error chain via `cause`.
 */
export class PrioBusError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PrioBusError';
  }
}

/** Thrown when configuration is unreadable, unparseable or fails validation. */
export class ConfigError extends PrioBusError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/** Thrown for malformed ids, priorities or hash input ranges. */
export class InvalidArgumentError extends PrioBusError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

/** Thrown when `processEvents()` is called from a handler it is running. */
export class ReentrantDrainError extends PrioBusError {
  constructor() {
    super('processEvents() called while a drain is already in progress', 'REENTRANT_DRAIN');
    this.name = 'ReentrantDrainError';
  }
}

/**
 * Thrown when a single drain processes `budget` events and more are
 * still pending. Remaining events stay queued.
 */
export class DrainBudgetExceededError extends PrioBusError {
  constructor(
    public readonly budget: number,
    public readonly processed: number,
    public readonly pending: number,
  ) {
    super(
      `Drain budget of ${budget} events exhausted with ${pending} still pending`,
      'DRAIN_BUDGET_EXCEEDED',
    );
    this.name = 'DrainBudgetExceededError';
  }
}

/** Wraps a handler failure when the dispatcher is set to propagate errors. */
export class HandlerError extends PrioBusError {
  constructor(
    public readonly eventType: number,
    cause: Error,
  ) {
    super(`Handler for event type ${eventType} failed: ${cause.message}`, 'HANDLER_ERROR', cause);
    this.name = 'HandlerError';
  }
}

/** Normalise an unknown thrown value into an `Error`. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
