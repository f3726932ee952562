// ---------------------------------------------------------------------------
// PrioBus — Test Helpers
// ---------------------------------------------------------------------------

import type { ILogger } from '../src/core/types/logger';
import type { DispatchEvent, Handler, HandlerCallback } from '../src/core/types/events';

export { createSilentLogger } from '../src/shared/logger';

export interface CapturedEntry {
  level: string;
  message: string;
  error?: Error;
  context?: Record<string, unknown>;
}

/** A logger that records all calls for assertions. */
export function createCapturingLogger(): ILogger & { entries: CapturedEntry[] } {
  const entries: CapturedEntry[] = [];
  const logger = {
    entries,
    debug(message: string, context?: Record<string, unknown>) { entries.push({ level: 'debug', message, context }); },
    info(message: string, context?: Record<string, unknown>) { entries.push({ level: 'info', message, context }); },
    warn(message: string, context?: Record<string, unknown>) { entries.push({ level: 'warn', message, context }); },
    error(message: string, error?: Error, context?: Record<string, unknown>) { entries.push({ level: 'error', message, error, context }); },
    child(): ILogger { return logger; },
  };
  return logger;
}

/** Build a handler whose callback appends `label` to `log`. */
export function recordingHandler(
  log: string[],
  label: string,
  priority: number,
  key?: string,
): Handler {
  const callback: HandlerCallback = (_event: Readonly<DispatchEvent>) => { log.push(label); };
  return key === undefined ? { priority, callback } : { priority, callback, key };
}
