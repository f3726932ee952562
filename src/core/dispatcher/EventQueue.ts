// ---------------------------------------------------------------------------
// PrioBus — Pending Event Queue
// ---------------------------------------------------------------------------
// Binary max-heap keyed by priority level. Events of equal level come out
// in the order they were pushed (FIFO), tracked by a sequence number.
// ---------------------------------------------------------------------------

import type { DispatchEvent } from '../types/events';

/** Heap entry. Also serves as the handle for removing a specific event. */
export interface QueuedEvent {
  readonly event: DispatchEvent;
  readonly seq: number;
}

/** True when `a` must be drained before `b`. */
function before(a: QueuedEvent, b: QueuedEvent): boolean {
  if (a.event.priorityLevel !== b.event.priorityLevel) {
    return a.event.priorityLevel > b.event.priorityLevel;
  }
  return a.seq < b.seq;
}

export class EventQueue {
  private readonly heap: QueuedEvent[] = [];
  private seq = 0;

  get size(): number {
    return this.heap.length;
  }

  push(event: DispatchEvent): void {
    this.heap.push({ event, seq: this.seq++ });
    this.siftUp(this.heap.length - 1);
  }

  /** The next entry to drain, left in place. */
  peek(): QueuedEvent | undefined {
    return this.heap[0];
  }

  /** Remove and return the next event to drain. */
  pop(): DispatchEvent | undefined {
    const top = this.heap[0];
    if (top === undefined) return undefined;

    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.event;
  }

  /**
   * Remove a previously peeked entry. It is normally still at the top, but
   * a handler may have pushed a higher-priority event above it since.
   */
  remove(entry: QueuedEvent): boolean {
    if (this.heap[0] === entry) {
      this.pop();
      return true;
    }

    const index = this.heap.indexOf(entry);
    if (index === -1) return false;

    const last = this.heap.pop();
    if (last !== undefined && index < this.heap.length) {
      this.heap[index] = last;
      this.siftDown(index);
      this.siftUp(index);
    }
    return true;
  }

  /**
   * Empty the queue and hand back what was in it, in drain order. A `keep`
   * entry that is still queued stays behind as the only element.
   */
  drainAll(keep?: QueuedEvent): DispatchEvent[] {
    const out: DispatchEvent[] = [];
    let kept: QueuedEvent | undefined;
    for (let top = this.heap[0]; top !== undefined; top = this.heap[0]) {
      this.pop();
      if (top === keep) kept = top;
      else out.push(top.event);
    }
    if (kept) this.heap.push(kept);
    return out;
  }

  // ── Heap Maintenance ─────────────────────────────────────────────────────

  private siftUp(i: number): void {
    const heap = this.heap;
    while (i > 0) {
      const parent = (i - 1) >>> 1;
      if (!before(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const heap = this.heap;
    const n = heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let best = i;
      if (left < n && before(heap[left], heap[best])) best = left;
      if (right < n && before(heap[right], heap[best])) best = right;
      if (best === i) return;
      [heap[i], heap[best]] = [heap[best], heap[i]];
      i = best;
    }
  }
}
