// ---------------------------------------------------------------------------
// PrioBus — Ordered Handler Set
// ---------------------------------------------------------------------------
// Sorted array with binary-search insert and removal. Traversal order is
// (priority desc, identity asc); two entries that compare equal under that
// order are the same member.
// ---------------------------------------------------------------------------

import type { Handler } from '../types/events';
import { type HandlerIdentity, compareIdentity } from './HandlerIdentity';

export interface HandlerEntry {
  readonly handler: Handler;
  readonly identity: HandlerIdentity;
}

interface SetKey {
  readonly priority: number;
  readonly identity: HandlerIdentity;
}

function compareKeys(a: SetKey, b: SetKey): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return compareIdentity(a.identity, b.identity);
}

export class HandlerSet {
  private readonly entries: HandlerEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  /**
   * Insert an entry at its ordered position.
   * Returns `false` if an equal entry is already present.
   */
  insert(entry: HandlerEntry): boolean {
    const { index, found } = this.search({ priority: entry.handler.priority, identity: entry.identity });
    if (found) return false;
    this.entries.splice(index, 0, entry);
    return true;
  }

  /** Remove the entry equal to the given key, returning it if present. */
  remove(priority: number, identity: HandlerIdentity): HandlerEntry | undefined {
    const { index, found } = this.search({ priority, identity });
    if (!found) return undefined;
    return this.entries.splice(index, 1)[0];
  }

  /**
   * Copy of the handlers in traversal order. Dispatch iterates this copy,
   * so mutations made by a running handler apply from the next event on.
   */
  snapshot(): Handler[] {
    return this.entries.map((e) => e.handler);
  }

  // ── Internal Helpers ─────────────────────────────────────────────────────

  private search(key: SetKey): { index: number; found: boolean } {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const entry = this.entries[mid];
      const cmp = compareKeys({ priority: entry.handler.priority, identity: entry.identity }, key);
      if (cmp === 0) return { index: mid, found: true };
      if (cmp < 0) lo = mid + 1;
      else hi = mid;
    }
    return { index: lo, found: false };
  }
}
