// ---------------------------------------------------------------------------
// PrioBus — Package Entry Point
// ---------------------------------------------------------------------------

export * from './core';
export { Logger, createSilentLogger } from './shared/logger';
export type { LoggerOptions } from './shared/logger';
export {
  PrioBusError,
  ConfigError,
  InvalidArgumentError,
  ReentrantDrainError,
  DrainBudgetExceededError,
  HandlerError,
} from './shared/errors';
export { TextPayload } from './shared/payloads';
