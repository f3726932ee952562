export { murmur3_32, hashString } from './murmur3';
export { EVENT_TYPE_SEED, hashEventName, eventTypeOf, isEventTypeId } from './eventType';
