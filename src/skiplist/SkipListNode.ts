/**
 * Anything holding forward pointers: the header or a real node.
 */
export interface SkipListLinks<T> {
  forward: (SkipListNode<T> | null)[];
}

/**
 * SkipList Node
 * Holds one element with forward pointers at levels 0..level (inclusive).
 */
export class SkipListNode<T> implements SkipListLinks<T> {
  value: T;
  readonly level: number;
  forward: (SkipListNode<T> | null)[];

  constructor(value: T, level: number) {
    this.value = value;
    this.level = level;
    this.forward = new Array<SkipListNode<T> | null>(level + 1).fill(null);
  }
}

/**
 * Valueless header, linked at every level up to maxLevel.
 */
export class SkipListHead<T> implements SkipListLinks<T> {
  forward: (SkipListNode<T> | null)[];

  constructor(maxLevel: number) {
    this.forward = new Array<SkipListNode<T> | null>(maxLevel + 1).fill(null);
  }
}
