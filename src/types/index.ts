/**
 * Shared type definitions
 */

/**
 * Total order over elements: negative when a < b, zero when equal, positive when a > b.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Source of uniform samples in [0, 1). Math.random fits.
 */
export type RandomSource = () => number;

export interface SkipListOptions<T> {
  compare?: Comparator<T>;
  random?: RandomSource;
}
