// ---------------------------------------------------------------------------
// PrioBus — Core Event Types
// ---------------------------------------------------------------------------
// Events are value-like records routed by a 32-bit type identifier.
// Handler priority and event priority level are separate weights: the
// former orders callbacks within one type, the latter orders the queue.
// ---------------------------------------------------------------------------

/**
 * Unsigned 32-bit key identifying a category of event.
 * Normally produced by hashing a name; raw values may be passed directly.
 */
export type EventTypeId = number;

/** A name to be hashed, or an already-computed identifier. */
export type EventTypeRef = string | EventTypeId;

/**
 * Opaque data attached to an event.
 *
 * The event owns its payload exclusively. The dispatcher calls `dispose()`
 * exactly once when the event is discarded. Payloads must not rely on any
 * particular handler running, running once, or running before another.
 */
export interface Payload {
  /** Render the payload as text for diagnostics. */
  toText(): string;

  /** Release any resources held by the payload. */
  dispose?(): void;
}

/**
 * A single occurrence waiting in (or being drained from) the queue.
 *
 * @typeParam P  Concrete payload type, if the producer wants it typed.
 */
export interface DispatchEvent<P extends Payload = Payload> {
  /** Which handler set receives this event. */
  readonly type: EventTypeId;

  /** Queue weight. Higher levels drain first. */
  readonly priorityLevel: number;

  readonly payload?: P;
}

/** Callback invoked with a read-only view of the event. */
export type HandlerCallback = (event: Readonly<DispatchEvent>) => void;

/**
 * A registered handler.
 *
 * Two handlers are the same set member when their `priority` and identity
 * match. Identity is `key` when given; otherwise it is the callback
 * function itself.
 */
export interface Handler {
  /** Invocation weight. Higher priorities run first. */
  readonly priority: number;

  readonly callback: HandlerCallback;

  /** Explicit identity token used to order and deduplicate equal priorities. */
  readonly key?: string;
}

/** Counters describing a single `processEvents()` call. */
export interface DrainReport {
  /** Events taken off the queue. */
  processed: number;

  /** Events that found a handler set. */
  dispatched: number;

  /** Events with no registered handlers, discarded without dispatch. */
  dropped: number;

  /** Handler throws isolated and logged during this drain. */
  handlerFailures: number;
}

/**
 * Public contract for the dispatcher.
 *
 * All methods are synchronous and expected to run on one logical thread.
 */
export interface IEventDispatcher {
  /**
   * Register a handler for an event type.
   * Returns `false` if an equal handler is already registered.
   */
  addHandler(eventType: EventTypeRef, handler: Handler): boolean;

  /**
   * Unregister the handler equal to `handler`.
   * Returns `false` (and does nothing else) when no such handler exists.
   */
  removeHandler(eventType: EventTypeRef, handler: Handler): boolean;

  /** Enqueue an event. The queue takes ownership of its payload. */
  pushEvent(event: DispatchEvent): void;

  /**
   * Drain the queue to empty, including events pushed by handlers while
   * draining. Never returns if handlers keep producing events forever,
   * unless a drain budget is configured.
   */
  processEvents(): DrainReport;

  /** Number of handlers for one type, or across all types. */
  handlerCount(eventType?: EventTypeRef): number;

  hasHandlers(eventType: EventTypeRef): boolean;

  /** Remove every handler, or only those of one type. */
  clearHandlers(eventType?: EventTypeRef): void;

  /** Number of events waiting in the queue. */
  pendingCount(): number;

  /** Discard all pending events, disposing their payloads. */
  clearQueue(): number;

  /** True while `processEvents()` is running. */
  isDraining(): boolean;
}
