/**
 * ordered-skiplist
 *
 * Sorted, duplicate-free set backed by a skip list.
 */
export * from './skiplist/index.js';
export { mathRandom, seededRandom, sequenceRandom } from './random/index.js';
export type { Comparator, RandomSource, SkipListOptions } from './types/index.js';
