import type { DispatchEvent, EventTypeRef, Payload } from '../types/events';
import { eventTypeOf } from '../hash/eventType';

/**
 * Build an event for `pushEvent`. Names are hashed with the dispatcher
 * seed, so `createEvent('player.joined', 1)` routes to handlers added
 * under `'player.joined'`.
 */
export function createEvent<P extends Payload>(
  type: EventTypeRef,
  priorityLevel: number,
  payload?: P,
): DispatchEvent<P> {
  const event: DispatchEvent<P> = { type: eventTypeOf(type), priorityLevel };
  return payload === undefined ? event : { ...event, payload };
}
