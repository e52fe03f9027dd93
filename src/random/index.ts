import type { RandomSource } from '../types/index.js';

export const mathRandom: RandomSource = () => Math.random();

/**
 * Reproducible source built on xorshift32.
 * The same seed always yields the same sequence.
 */
export function seededRandom(seed: number = 0x9e3779b9): RandomSource {
  // xorshift32 gets stuck at zero
  let state = (seed | 0) || 0x9e3779b9;
  return () => {
    let x = state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    state = x | 0;
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Replays the given samples in order, wrapping around at the end.
 * Useful for pinning node levels in tests.
 */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError('sequenceRandom needs at least one value');
  }
  for (const v of values) {
    if (!(v >= 0 && v < 1)) {
      throw new RangeError(`Random sample out of range [0, 1): ${v}`);
    }
  }
  let i = 0;
  return () => {
    const v = values[i];
    i = (i + 1) % values.length;
    return v;
  };
}
