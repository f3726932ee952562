export { EventDispatcher } from './EventDispatcher';
export type { EventDispatcherOptions } from './EventDispatcher';
export { EventQueue } from './EventQueue';
export type { QueuedEvent } from './EventQueue';
export { HandlerSet } from './HandlerSet';
export { createEvent } from './createEvent';
