/**
 * randtext — Random Sources
 *
 * Every generate call takes its random source as an argument; there is no
 * process-wide generator. Use one source per caller when generating from
 * several places at once.
 */

import type { RandomSite, RandomSource } from './types';

/**
 * One shared increasing stream: start, start + 1, start + 2, ...
 * Every node draws from the same counter, in evaluation order.
 */
export function counter(start = 0): RandomSource {
  let current = start;
  return {
    next: () => current++,
  };
}

/**
 * An independent increasing stream per node. Each char class, repetition
 * and alternation sees start, start + 1, ... across successive generate
 * calls, whatever the other nodes drew.
 */
export function perSiteCounter(start = 0): RandomSource {
  const streams = new WeakMap<RandomSite, number>();
  return {
    next(site: RandomSite): number {
      const current = streams.get(site) ?? start;
      streams.set(site, current + 1);
      return current;
    },
  };
}

/** Cycles through a fixed list of values. */
export function fixed(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError('fixed() needs at least one value');
  }
  for (const value of values) {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Random values must be non-negative integers, got ${value}`);
    }
  }
  let index = 0;
  return {
    next(): number {
      const value = values[index % values.length];
      index++;
      return value;
    },
  };
}

/** Hashes a seed salt to 32 bits (FNV-1a over UTF-16 units). */
export function fnv1a32(s: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    hash = Math.imul(hash ^ s.charCodeAt(i), 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Seeded source behind `seeded()` and `randtext --seed`. The same seed and
 * salt give the same values on every platform. Draws ignore the site, so
 * it is one shared stream like counter().
 */
export class XorShift32 implements RandomSource {
  private x: number;

  constructor(seed: number, salt = 'randtext') {
    // A zero state would stay zero forever.
    this.x = ((seed >>> 0) ^ fnv1a32(salt)) >>> 0 || 0x9e3779b9;
  }

  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }
}

/** A reproducible pseudo-random stream. */
export function seeded(seed: number): RandomSource {
  return new XorShift32(seed);
}

/** Non-reproducible source backed by Math.random. */
export function mathRandom(): RandomSource {
  return {
    next: () => Math.floor(Math.random() * 0x100000000),
  };
}
