// ---------------------------------------------------------------------------
// PrioBus — Murmur3 Hash Tests
// ---------------------------------------------------------------------------

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { murmur3_32, hashString } from '../src/core/hash/murmur3';
import { InvalidArgumentError } from '../src/shared/errors';

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

describe('murmur3_32', () => {
  // ── Reference Vectors ──────────────────────────────────────────────────

  it('hashes empty input by seed', () => {
    assert.equal(murmur3_32(bytes(), 0, 0), 0);
    assert.equal(murmur3_32(bytes(), 0, 1), 0x514e28b7);
    assert.equal(murmur3_32(bytes(), 0, 0xffffffff), 0x81f16f39);
  });

  it('hashes a single full block', () => {
    assert.equal(murmur3_32(bytes(0x21, 0x43, 0x65, 0x87), 4, 0), 0xf55b516b);
    assert.equal(murmur3_32(bytes(0x21, 0x43, 0x65, 0x87), 4, 0x5082edee), 0x2362f9de);
    assert.equal(murmur3_32(bytes(0xff, 0xff, 0xff, 0xff), 4, 0), 0x76293b50);
    assert.equal(murmur3_32(bytes(0, 0, 0, 0), 4, 0), 0x2362f9de);
  });

  it('folds 3, 2 and 1 byte tails', () => {
    assert.equal(murmur3_32(bytes(0x21, 0x43, 0x65), 3, 0), 0x7e4a8634);
    assert.equal(murmur3_32(bytes(0x21, 0x43), 2, 0), 0xa0f7b07a);
    assert.equal(murmur3_32(bytes(0x21), 1, 0), 0x72661cf4);
  });

  it('folds zero-valued tails', () => {
    assert.equal(murmur3_32(bytes(0, 0, 0), 3, 0), 0x85f0b427);
    assert.equal(murmur3_32(bytes(0, 0), 2, 0), 0x30f4c306);
    assert.equal(murmur3_32(bytes(0), 1, 0), 0x514e28b7);
  });

  // ── Length Handling ────────────────────────────────────────────────────

  it('defaults length to the whole input and seed to 0', () => {
    assert.equal(murmur3_32(bytes(0x21, 0x43, 0x65)), 0x7e4a8634);
  });

  it('hashes only the first `length` bytes', () => {
    const data = bytes(0x21, 0x43, 0x65, 0x87, 0x99);
    assert.equal(murmur3_32(data, 3, 0), 0x7e4a8634);
    assert.equal(murmur3_32(data, 4, 0), 0xf55b516b);
  });

  it('rejects a length outside the input', () => {
    assert.throws(() => murmur3_32(bytes(1, 2), 3, 0), InvalidArgumentError);
    assert.throws(() => murmur3_32(bytes(1, 2), -1, 0), InvalidArgumentError);
    assert.throws(() => murmur3_32(bytes(1, 2), 1.5, 0), InvalidArgumentError);
  });

  it('always returns an unsigned 32-bit integer', () => {
    const h = murmur3_32(bytes(0xff, 0xff, 0xff, 0xff), 4, 0);
    assert.ok(h >= 0 && h <= 0xffffffff);
    assert.ok(Number.isInteger(h));
  });
});

describe('hashString', () => {
  it('matches reference vectors for ASCII strings', () => {
    assert.equal(hashString('', 0), 0);
    assert.equal(hashString('test', 0), 0xba6bd213);
    assert.equal(hashString('abc', 0), 0xb3dd93fa);
    assert.equal(
      hashString('abcdbcdecdefdefgefghfghighijhijkijkljklmklmnlmnomnopnopq', 0),
      0xee925b90,
    );
  });

  it('matches reference vectors with a non-zero seed', () => {
    const seed = 0x9747b28c;
    assert.equal(hashString('aaaa', seed), 0x5a97808a);
    assert.equal(hashString('aaa', seed), 0x283e0130);
    assert.equal(hashString('aa', seed), 0x5d211726);
    assert.equal(hashString('a', seed), 0x7fa09ea6);
    assert.equal(hashString('abcd', seed), 0xf0478627);
    assert.equal(hashString('abc', seed), 0xc84a62dd);
    assert.equal(hashString('ab', seed), 0x74875592);
    assert.equal(hashString('Hello, world!', seed), 0x24884cba);
    assert.equal(hashString('The quick brown fox jumps over the lazy dog', seed), 0x2fa826cd);
  });

  it('hashes the UTF-8 encoding of non-ASCII text', () => {
    assert.equal(hashString('ππππππππ', 0x9747b28c), 0xd58063c1);
  });

  it('handles embedded NUL characters', () => {
    assert.equal(hashString('\0\0\0\0', 0), 0x2362f9de);
  });

  it('is deterministic across calls', () => {
    const first = hashString('player.joined');
    for (let i = 0; i < 5; i++) {
      assert.equal(hashString('player.joined'), first);
    }
  });
});
