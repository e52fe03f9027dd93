import assert from 'node:assert';
import { SkipList, MAX_LEVEL } from '../src/skiplist/index.js';
import { sequenceRandom } from '../src/random/index.js';
import type { RandomSource } from '../src/types/index.js';

/**
 * Random source that makes successive inserts land on the given levels.
 * Level k takes k draws below 0.25 followed by one that stops the climb.
 */
export function levels(...wanted: number[]): RandomSource {
  const draws: number[] = [];
  for (const level of wanted) {
    for (let i = 0; i < level; i++) {
      draws.push(0);
    }
    draws.push(0.5);
  }
  return sequenceRandom(draws);
}

/**
 * Check the structural invariants of a list of numbers.
 */
export function assertTopology(list: SkipList<number>): void {
  const base = list.valuesAt(0);
  assert.strictEqual(base.length, list.size);
  for (let i = 1; i < base.length; i++) {
    assert.ok(base[i - 1] < base[i], `level 0 not strictly ascending at ${i}`);
  }

  let below = base;
  for (let level = 1; level <= MAX_LEVEL; level++) {
    const lane = list.valuesAt(level);
    if (level > list.currentLevel) {
      assert.strictEqual(lane.length, 0, `level ${level} above currentLevel is not empty`);
    }
    // every lane is a subsequence of the one below it
    let j = 0;
    for (const value of lane) {
      while (j < below.length && below[j] !== value) j++;
      assert.ok(j < below.length, `${value} at level ${level} missing from level ${level - 1}`);
      j++;
    }
    below = lane;
  }

  if (list.size > 0) {
    assert.ok(list.valuesAt(list.currentLevel).length > 0, 'currentLevel overstates the tallest node');
  } else {
    assert.strictEqual(list.currentLevel, 0);
  }
}
