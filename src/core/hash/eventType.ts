// ---------------------------------------------------------------------------
// PrioBus — Event Type Identifiers
// ---------------------------------------------------------------------------
// Name → id conversion. Every dispatcher hashes with the same fixed seed
// so a given name maps to the same id in every process and every run.
// ---------------------------------------------------------------------------

import type { EventTypeId, EventTypeRef } from '../types/events';
import { InvalidArgumentError } from '../../shared/errors';
import { hashString } from './murmur3';

/** Seed used for all name → id conversions. */
export const EVENT_TYPE_SEED = 0;

const MAX_EVENT_TYPE_ID = 0xffffffff;

export function isEventTypeId(value: unknown): value is EventTypeId {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_EVENT_TYPE_ID
  );
}

/** Hash an event-type name into its identifier. */
export function hashEventName(name: string): EventTypeId {
  return hashString(name, EVENT_TYPE_SEED);
}

/**
 * Resolve a name or raw id to an `EventTypeId`.
 *
 * @throws InvalidArgumentError for a raw id outside the unsigned 32-bit range.
 */
export function eventTypeOf(ref: EventTypeRef): EventTypeId {
  if (typeof ref === 'string') {
    return hashEventName(ref);
  }
  if (!isEventTypeId(ref)) {
    throw new InvalidArgumentError(`Event type id must be an unsigned 32-bit integer, got ${ref}`);
  }
  return ref;
}
