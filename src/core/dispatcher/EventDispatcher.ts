// ---------------------------------------------------------------------------
// PrioBus — EventDispatcher Implementation
// ---------------------------------------------------------------------------
// Synchronous, single-threaded dispatcher. Handlers are kept per event type
// in a deterministic order (priority desc, identity asc). Events wait in a
// priority queue until `processEvents()` drains it. Handlers may push new
// events while a drain is running; those are drained by the same call.
// ---------------------------------------------------------------------------

import type {
  DispatchEvent,
  DrainReport,
  EventTypeId,
  EventTypeRef,
  Handler,
  IEventDispatcher,
  Payload,
} from '../types/events';
import type { DispatcherConfig } from '../types/config';
import type { ILogger } from '../types/logger';
import { eventTypeOf, isEventTypeId } from '../hash/eventType';
import {
  DrainBudgetExceededError,
  HandlerError,
  InvalidArgumentError,
  ReentrantDrainError,
  toError,
} from '../../shared/errors';
import { createSilentLogger } from '../../shared/logger';
import { DEFAULT_DISPATCHER_CONFIG } from '../config/defaults';
import { EventQueue, type QueuedEvent } from './EventQueue';
import { HandlerSet } from './HandlerSet';
import { CallbackTokens, type HandlerIdentity, describeIdentity, keyIdentity } from './HandlerIdentity';

export interface EventDispatcherOptions {
  /** Defaults to a silent logger. */
  logger?: ILogger;
  config?: Partial<DispatcherConfig>;
}

export class EventDispatcher implements IEventDispatcher {
  /** Event type → ordered handler set. Empty sets are removed. */
  private readonly handlers = new Map<EventTypeId, HandlerSet>();
  private readonly queue = new EventQueue();
  private readonly tokens = new CallbackTokens();
  /** Payloads owned by a queued event. Each may be owned by one event only. */
  private readonly queuedPayloads = new WeakSet<Payload>();
  /** The entry whose handlers are running; `clearQueue` leaves it to the drain. */
  private inFlight: QueuedEvent | undefined;
  private readonly config: DispatcherConfig;
  private readonly logger: ILogger;
  private draining = false;

  constructor(options: EventDispatcherOptions = {}) {
    this.logger = (options.logger ?? createSilentLogger()).child('EventDispatcher');
    this.config = { ...DEFAULT_DISPATCHER_CONFIG, ...options.config };

    if (!Number.isSafeInteger(this.config.maxEventsPerDrain) || this.config.maxEventsPerDrain < 0) {
      throw new InvalidArgumentError(
        `maxEventsPerDrain must be a non-negative integer, got ${this.config.maxEventsPerDrain}`,
      );
    }
  }

  // ── Registration ─────────────────────────────────────────────────────────

  addHandler(eventType: EventTypeRef, handler: Handler): boolean {
    const type = eventTypeOf(eventType);
    assertPriority(handler.priority, 'Handler priority');

    const identity: HandlerIdentity = keyIdentity(handler) ?? {
      kind: 'token',
      token: this.tokens.issue(handler.callback),
    };

    let set = this.handlers.get(type);
    if (!set) {
      set = new HandlerSet();
      this.handlers.set(type, set);
    }

    const inserted = set.insert({ handler, identity });
    this.logger.debug(inserted ? 'Handler added' : 'Duplicate handler ignored', {
      eventType: type,
      priority: handler.priority,
      identity: describeIdentity(identity),
    });
    return inserted;
  }

  removeHandler(eventType: EventTypeRef, handler: Handler): boolean {
    const type = eventTypeOf(eventType);
    const set = this.handlers.get(type);
    if (!set) return false;

    const identity = this.lookupIdentity(handler);
    if (!identity) return false;

    const removed = set.remove(handler.priority, identity);
    if (!removed) return false;

    if (set.size === 0) {
      this.handlers.delete(type);
    }

    this.logger.debug('Handler removed', {
      eventType: type,
      priority: handler.priority,
      identity: describeIdentity(identity),
    });
    return true;
  }

  clearHandlers(eventType?: EventTypeRef): void {
    if (eventType === undefined) {
      this.handlers.clear();
    } else {
      this.handlers.delete(eventTypeOf(eventType));
    }
  }

  // ── Queue ────────────────────────────────────────────────────────────────

  pushEvent(event: DispatchEvent): void {
    if (!isEventTypeId(event.type)) {
      throw new InvalidArgumentError(`Event type id must be an unsigned 32-bit integer, got ${event.type}`);
    }
    assertPriority(event.priorityLevel, 'Event priority level');
    if (event.payload !== undefined) {
      if (this.queuedPayloads.has(event.payload)) {
        throw new InvalidArgumentError('Payload is already owned by a queued event');
      }
      this.queuedPayloads.add(event.payload);
    }

    this.queue.push(event);
  }

  clearQueue(): number {
    const discarded = this.queue.drainAll(this.inFlight);
    for (const event of discarded) {
      this.release(event);
    }
    if (discarded.length > 0) {
      this.logger.debug('Queue cleared', { discarded: discarded.length });
    }
    return discarded.length;
  }

  // ── Drain ────────────────────────────────────────────────────────────────

  processEvents(): DrainReport {
    if (this.draining) {
      throw new ReentrantDrainError();
    }

    const report: DrainReport = { processed: 0, dispatched: 0, dropped: 0, handlerFailures: 0 };
    const budget = this.config.maxEventsPerDrain;
    this.draining = true;

    try {
      for (let entry = this.queue.peek(); entry !== undefined; entry = this.queue.peek()) {
        if (budget > 0 && report.processed >= budget) {
          this.logger.warn('Drain budget exhausted', { budget, pending: this.queue.size });
          throw new DrainBudgetExceededError(budget, report.processed, this.queue.size);
        }

        const { event } = entry;
        let failure: Error | undefined;
        const set = this.handlers.get(event.type);

        this.inFlight = entry;
        try {
          if (set) {
            report.dispatched++;
            failure = this.dispatch(event, set, report);
          } else {
            report.dropped++;
            this.logger.debug('No handlers for event', { eventType: event.type });
          }
        } finally {
          this.inFlight = undefined;
        }

        if (this.queue.remove(entry)) {
          report.processed++;
          this.release(event);
        }

        if (failure) {
          throw new HandlerError(event.type, failure);
        }
      }
    } finally {
      this.draining = false;
    }

    this.logger.debug('Drain complete', { ...report });
    return report;
  }

  isDraining(): boolean {
    return this.draining;
  }

  // ── Diagnostics ──────────────────────────────────────────────────────────

  handlerCount(eventType?: EventTypeRef): number {
    if (eventType !== undefined) {
      return this.handlers.get(eventTypeOf(eventType))?.size ?? 0;
    }
    let total = 0;
    for (const set of this.handlers.values()) {
      total += set.size;
    }
    return total;
  }

  hasHandlers(eventType: EventTypeRef): boolean {
    return this.handlerCount(eventType) > 0;
  }

  pendingCount(): number {
    return this.queue.size;
  }

  // ── Internal Helpers ─────────────────────────────────────────────────────

  /**
   * Invoke a snapshot of the set in order. Returns the first failure when
   * errors propagate; otherwise failures are logged and counted.
   */
  private dispatch(event: DispatchEvent, set: HandlerSet, report: DrainReport): Error | undefined {
    for (const handler of set.snapshot()) {
      try {
        handler.callback(event);
      } catch (err) {
        const error = toError(err);
        if (this.config.handlerErrors === 'propagate') {
          return error;
        }
        report.handlerFailures++;
        this.logger.error('Event handler failed', error, {
          eventType: event.type,
          priority: handler.priority,
        });
      }
    }
    return undefined;
  }

  /** The event is done with its payload. */
  private release(event: DispatchEvent): void {
    const payload = event.payload;
    if (payload === undefined) return;
    this.queuedPayloads.delete(payload);
    if (payload.dispose === undefined) return;
    try {
      payload.dispose();
    } catch (err) {
      this.logger.error('Payload dispose failed', toError(err), { eventType: event.type });
    }
  }

  private lookupIdentity(handler: Handler): HandlerIdentity | undefined {
    const keyed = keyIdentity(handler);
    if (keyed) return keyed;
    const token = this.tokens.peek(handler.callback);
    return token === undefined ? undefined : { kind: 'token', token };
  }
}

function assertPriority(value: number, label: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`${label} must be a safe integer, got ${value}`);
  }
}
