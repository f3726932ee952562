// ---------------------------------------------------------------------------
// PrioBus — Event Type Identifier Tests
// ---------------------------------------------------------------------------

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { EVENT_TYPE_SEED, eventTypeOf, hashEventName, isEventTypeId } from '../src/core/hash/eventType';
import { hashString } from '../src/core/hash/murmur3';
import { createEvent } from '../src/core/dispatcher/createEvent';
import { TextPayload } from '../src/shared/payloads';
import { InvalidArgumentError } from '../src/shared/errors';

describe('hashEventName', () => {
  it('uses the fixed seed', () => {
    assert.equal(EVENT_TYPE_SEED, 0);
    assert.equal(hashEventName('abc'), 0xb3dd93fa);
    assert.equal(hashEventName('ui.click'), hashString('ui.click', EVENT_TYPE_SEED));
  });

  it('gives different names different ids', () => {
    assert.notEqual(hashEventName('ui.click'), hashEventName('ui.hover'));
  });
});

describe('eventTypeOf', () => {
  it('hashes names', () => {
    assert.equal(eventTypeOf('test'), 0xba6bd213);
  });

  it('passes valid raw ids through', () => {
    assert.equal(eventTypeOf(0), 0);
    assert.equal(eventTypeOf(42), 42);
    assert.equal(eventTypeOf(0xffffffff), 0xffffffff);
  });

  it('rejects ids outside the unsigned 32-bit range', () => {
    assert.throws(() => eventTypeOf(-1), InvalidArgumentError);
    assert.throws(() => eventTypeOf(0x100000000), InvalidArgumentError);
    assert.throws(() => eventTypeOf(1.5), InvalidArgumentError);
    assert.throws(() => eventTypeOf(Number.NaN), InvalidArgumentError);
  });
});

describe('isEventTypeId', () => {
  it('accepts only unsigned 32-bit integers', () => {
    assert.equal(isEventTypeId(7), true);
    assert.equal(isEventTypeId('7'), false);
    assert.equal(isEventTypeId(-7), false);
  });
});

describe('createEvent', () => {
  it('resolves the type and omits an absent payload', () => {
    const event = createEvent('abc', 3);
    assert.deepStrictEqual(event, { type: 0xb3dd93fa, priorityLevel: 3 });
    assert.equal('payload' in event, false);
  });

  it('attaches the payload', () => {
    const payload = new TextPayload('hello');
    const event = createEvent(17, 1, payload);
    assert.equal(event.type, 17);
    assert.equal(event.payload, payload);
    assert.equal(event.payload?.toText(), 'hello');
  });
});
