import type { RandomSource } from '../types/index.js';

export const MAX_LEVEL = 16;
export const LEVEL_PROBABILITY = 0.25;

/**
 * Generate random level for skiplist node using probabilistic approach.
 * Returns a level index in [0, maxLevel]; each step up has the given probability
 * (geometric distribution).
 */
export function randomLevel(
  random: RandomSource,
  maxLevel: number = MAX_LEVEL,
  probability: number = LEVEL_PROBABILITY
): number {
  let level = 0;
  while (level < maxLevel && random() < probability) {
    level++;
  }
  return level;
}

type Ordered = number | string | bigint;

function isOrdered(value: unknown): value is Ordered {
  const t = typeof value;
  return t === 'number' || t === 'string' || t === 'bigint';
}

function isNumeric(value: Ordered): boolean {
  return typeof value !== 'string';
}

/**
 * Default ordering for numbers, strings and bigints.
 * Numbers and bigints compare with each other; strings only with strings.
 * Anything else needs an explicit comparator.
 */
export function naturalCompare(a: unknown, b: unknown): number {
  if (!isOrdered(a) || !isOrdered(b)) {
    throw new TypeError('No comparator given for non-primitive elements');
  }
  if (isNumeric(a) !== isNumeric(b)) {
    throw new TypeError(`Cannot order ${typeof a} against ${typeof b} without a comparator`);
  }
  if (Number.isNaN(a) || Number.isNaN(b)) {
    throw new RangeError('NaN is not supported');
  }
  return a < b ? -1 : a > b ? 1 : 0;
}
