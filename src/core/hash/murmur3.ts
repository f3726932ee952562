// ---------------------------------------------------------------------------
// PrioBus — Murmur3 (x86, 32-bit) Hash
// ---------------------------------------------------------------------------
// Bit-exact with the reference MurmurHash3_x86_32. Identifiers computed by
// independent processes over the same bytes and seed must agree, so any
// change here is a compatibility break.
// ---------------------------------------------------------------------------

import { InvalidArgumentError } from '../../shared/errors';

const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;
const BLOCK_ADD = 0xe6546b64;

const utf8 = new TextEncoder();

function rotl32(x: number, r: number): number {
  return (x << r) | (x >>> (32 - r));
}

/** Scramble a single 32-bit block before it is folded into the hash. */
function scramble(k: number): number {
  k = Math.imul(k, C1);
  k = rotl32(k, 15);
  return Math.imul(k, C2);
}

/** Avalanche finisher (fmix32). */
function fmix32(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/**
 * Hash the first `length` bytes of `key`.
 *
 * @returns An unsigned 32-bit integer.
 * @throws InvalidArgumentError if `length` is not an integer in `[0, key.length]`.
 */
export function murmur3_32(key: Uint8Array, length: number = key.length, seed: number = 0): number {
  if (!Number.isInteger(length) || length < 0 || length > key.length) {
    throw new InvalidArgumentError(
      `Hash length ${length} is out of range for a ${key.length}-byte input`,
    );
  }

  let h = seed >>> 0;
  const nblocks = length >>> 2;

  for (let i = 0; i < nblocks; i++) {
    const o = i << 2;
    const k = key[o] | (key[o + 1] << 8) | (key[o + 2] << 16) | (key[o + 3] << 24);

    h ^= scramble(k);
    h = rotl32(h, 13);
    h = (Math.imul(h, 5) + BLOCK_ADD) | 0;
  }

  // Tail: no combine step, only the xor.
  const tail = nblocks << 2;
  let k = 0;
  switch (length & 3) {
    case 3:
      k ^= key[tail + 2] << 16;
    // falls through
    case 2:
      k ^= key[tail + 1] << 8;
    // falls through
    case 1:
      k ^= key[tail];
      h ^= scramble(k);
  }

  h ^= length;
  return fmix32(h);
}

/** Hash the UTF-8 encoding of `text`. */
export function hashString(text: string, seed: number = 0): number {
  const bytes = utf8.encode(text);
  return murmur3_32(bytes, bytes.length, seed);
}
