// ---------------------------------------------------------------------------
// PrioBus — Core Public API
// ---------------------------------------------------------------------------

// Types
export * from './types';

// Hashing
export { murmur3_32, hashString, EVENT_TYPE_SEED, hashEventName, eventTypeOf, isEventTypeId } from './hash';

// Dispatcher
export { EventDispatcher, EventQueue, HandlerSet, createEvent } from './dispatcher';
export type { EventDispatcherOptions, QueuedEvent } from './dispatcher';

// Configuration
export { ConfigLoader, ConfigValidator, DEFAULT_DISPATCHER_CONFIG, DEFAULT_LOGGING_CONFIG } from './config';
export type { ValidationResult } from './config';

// Composition
export { createDispatcher } from './createDispatcher';
export type { CreateDispatcherOptions, DispatcherRuntime } from './createDispatcher';
