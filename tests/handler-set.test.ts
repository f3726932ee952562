// ---------------------------------------------------------------------------
// PrioBus — HandlerSet & Handler Identity Tests
// ---------------------------------------------------------------------------

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { HandlerSet } from '../src/core/dispatcher/HandlerSet';
import { CallbackTokens, compareIdentity, type HandlerIdentity } from '../src/core/dispatcher/HandlerIdentity';
import type { Handler } from '../src/core/types/events';

const noop = (): void => {};

function keyed(priority: number, key: string): { handler: Handler; identity: HandlerIdentity } {
  return { handler: { priority, callback: noop, key }, identity: { kind: 'key', key } };
}

function tokened(priority: number, token: number): { handler: Handler; identity: HandlerIdentity } {
  return { handler: { priority, callback: noop }, identity: { kind: 'token', token } };
}

describe('compareIdentity', () => {
  it('orders keys by code unit', () => {
    assert.ok(compareIdentity({ kind: 'key', key: 'a' }, { kind: 'key', key: 'b' }) < 0);
    assert.ok(compareIdentity({ kind: 'key', key: 'B' }, { kind: 'key', key: 'a' }) < 0);
    assert.equal(compareIdentity({ kind: 'key', key: 'x' }, { kind: 'key', key: 'x' }), 0);
  });

  it('orders tokens ascending', () => {
    assert.ok(compareIdentity({ kind: 'token', token: 1 }, { kind: 'token', token: 2 }) < 0);
    assert.equal(compareIdentity({ kind: 'token', token: 3 }, { kind: 'token', token: 3 }), 0);
  });

  it('puts keyed identities before tokens', () => {
    assert.ok(compareIdentity({ kind: 'key', key: 'z' }, { kind: 'token', token: 1 }) < 0);
    assert.ok(compareIdentity({ kind: 'token', token: 1 }, { kind: 'key', key: 'z' }) > 0);
  });
});

describe('CallbackTokens', () => {
  it('issues one stable token per callback', () => {
    const tokens = new CallbackTokens();
    const a = (): void => {};
    const b = (): void => {};
    assert.equal(tokens.issue(a), 1);
    assert.equal(tokens.issue(b), 2);
    assert.equal(tokens.issue(a), 1);
  });

  it('peek does not issue', () => {
    const tokens = new CallbackTokens();
    const a = (): void => {};
    assert.equal(tokens.peek(a), undefined);
    tokens.issue(a);
    assert.equal(tokens.peek(a), 1);
  });
});

describe('HandlerSet', () => {
  let set: HandlerSet;

  beforeEach(() => {
    set = new HandlerSet();
  });

  it('orders by priority descending', () => {
    const p5 = keyed(5, 'a');
    const p10 = keyed(10, 'a');
    const p1 = keyed(1, 'a');
    set.insert(p5);
    set.insert(p10);
    set.insert(p1);

    assert.deepStrictEqual(set.snapshot().map((h) => h.priority), [10, 5, 1]);
  });

  it('breaks priority ties by identity, not insertion order', () => {
    const t2 = tokened(5, 2);
    const kb = keyed(5, 'b');
    const t1 = tokened(5, 1);
    const ka = keyed(5, 'a');
    for (const e of [t2, kb, t1, ka]) set.insert(e);

    assert.deepStrictEqual(set.snapshot(), [ka.handler, kb.handler, t1.handler, t2.handler]);
  });

  it('does not insert an entry equal to an existing member', () => {
    assert.equal(set.insert(keyed(3, 'dup')), true);
    assert.equal(set.insert(keyed(3, 'dup')), false);
    assert.equal(set.size, 1);
  });

  it('treats a different priority as a different member', () => {
    set.insert(keyed(3, 'k'));
    assert.equal(set.insert(keyed(4, 'k')), true);
    assert.equal(set.size, 2);
  });

  it('removes only the exactly matching member', () => {
    const entry = keyed(3, 'k');
    set.insert(entry);
    set.insert(keyed(3, 'other'));

    assert.equal(set.remove(4, { kind: 'key', key: 'k' }), undefined);
    assert.equal(set.remove(3, { kind: 'key', key: 'k' }), entry);
    assert.equal(set.remove(3, { kind: 'key', key: 'k' }), undefined);
    assert.equal(set.size, 1);
  });

  it('snapshot is a copy', () => {
    set.insert(keyed(1, 'a'));
    const snap = set.snapshot();
    set.insert(keyed(2, 'b'));
    assert.equal(snap.length, 1);
  });
});
