// ---------------------------------------------------------------------------
// PrioBus — Handler Identity
// ---------------------------------------------------------------------------
// Handlers of equal priority are ordered by identity, never by insertion.
// A handler's identity is its explicit `key` when present. Otherwise it is
// a token issued for its callback function the first time the owning
// dispatcher sees that function.
// ---------------------------------------------------------------------------

import type { Handler, HandlerCallback } from '../types/events';

export type HandlerIdentity =
  | { readonly kind: 'key'; readonly key: string }
  | { readonly kind: 'token'; readonly token: number };

/**
 * Issues monotonically increasing tokens per callback function.
 * Held weakly so discarded callbacks do not pin memory.
 */
export class CallbackTokens {
  private readonly tokens = new WeakMap<HandlerCallback, number>();
  private next = 1;

  /** Return the callback's token, issuing one on first sight. */
  issue(callback: HandlerCallback): number {
    let token = this.tokens.get(callback);
    if (token === undefined) {
      token = this.next++;
      this.tokens.set(callback, token);
    }
    return token;
  }

  /** Return the callback's token without issuing one. */
  peek(callback: HandlerCallback): number | undefined {
    return this.tokens.get(callback);
  }
}

export function keyIdentity(handler: Handler): HandlerIdentity | undefined {
  return handler.key !== undefined ? { kind: 'key', key: handler.key } : undefined;
}

/**
 * Strict total order over identities: keyed before token, keys by code
 * unit, tokens ascending.
 */
export function compareIdentity(a: HandlerIdentity, b: HandlerIdentity): number {
  if (a.kind === 'key' && b.kind === 'key') {
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
  }
  if (a.kind === 'token' && b.kind === 'token') {
    return a.token - b.token;
  }
  return a.kind === 'key' ? -1 : 1;
}

export function describeIdentity(identity: HandlerIdentity): string {
  return identity.kind === 'key' ? `key:${identity.key}` : `token:${identity.token}`;
}
