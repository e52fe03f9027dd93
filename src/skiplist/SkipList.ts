import { inspect } from 'node:util';
import { SkipListHead, SkipListNode } from './SkipListNode.js';
import type { SkipListLinks } from './SkipListNode.js';
import { ConstSkipListIterator, SkipListIterator } from './SkipListIterator.js';
import { MAX_LEVEL, naturalCompare, randomLevel } from './utils.js';
import { mathRandom } from '../random/index.js';
import type { Comparator, RandomSource, SkipListOptions } from '../types/index.js';

/**
 * SkipList as an ordered set.
 * Provides O(log N) expected insert, lookup and erase, and ascending iteration.
 *
 * Levels are indices: a node of level k is linked at 0..k, the header at
 * 0..MAX_LEVEL. 'level' is the highest index holding a real node (0 when empty).
 */
export class SkipList<T> implements Iterable<T> {
  private head: SkipListHead<T>;
  private level: number;
  private length: number;
  private comparator: Comparator<T>;
  private readonly random: RandomSource;

  constructor(options: SkipListOptions<T> = {}) {
    this.comparator = options.compare || naturalCompare;
    this.random = options.random || mathRandom;
    this.head = new SkipListHead<T>(MAX_LEVEL);
    this.level = 0;
    this.length = 0;
  }

  static fromIterable<T>(values: Iterable<T>, options: SkipListOptions<T> = {}): SkipList<T> {
    const list = new SkipList<T>(options);
    for (const value of values) {
      list.insert(value);
    }
    return list;
  }

  /**
   * Deep copy of source with its comparator. See clone() for the random source.
   */
  static from<T>(source: SkipList<T>, random?: RandomSource): SkipList<T> {
    return source.clone(random);
  }

  /**
   * New list taking over source's nodes. Source is left empty and usable.
   * Without a random source of its own the new list shares source's.
   */
  static move<T>(source: SkipList<T>, random: RandomSource = source.random): SkipList<T> {
    const list = new SkipList<T>({ compare: source.comparator, random });
    return list.moveFrom(source);
  }

  get size(): number {
    return this.length;
  }

  get currentLevel(): number {
    return this.level;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * Insert value. Duplicates are ignored.
   * Throws whatever the comparator throws for a value it cannot order.
   */
  insert(value: T): void {
    if (!this.isSelfEqual(value)) {
      throw new RangeError(`Value does not compare equal to itself: ${String(value)}`);
    }

    // Levels above the current top keep the header as predecessor
    const update = this.newUpdateVector();
    const x = this.findPredecessors(value, update);

    const next = x.forward[0];
    if (next !== null && this.comparator(next.value, value) === 0) {
      return;
    }

    const newLevel = randomLevel(this.random);
    if (newLevel > this.level) {
      this.level = newLevel;
    }

    const newNode = new SkipListNode(value, newLevel);
    for (let i = 0; i <= newLevel; i++) {
      newNode.forward[i] = update[i].forward[i];
      update[i].forward[i] = newNode;
    }

    this.length++;
  }

  /**
   * Throws like insert() for a value the comparator cannot order, empty list or not.
   */
  contains(value: T): boolean {
    if (!this.isSelfEqual(value)) return false;
    const next = this.findPredecessors(value).forward[0];
    return next !== null && this.comparator(next.value, value) === 0;
  }

  /**
   * Erase value. Returns true if found and removed.
   * Throws like insert() for a value the comparator cannot order.
   */
  erase(value: T): boolean {
    if (!this.isSelfEqual(value)) return false;

    const update = this.newUpdateVector();
    const x = this.findPredecessors(value, update);

    const victim = x.forward[0];
    if (victim === null || this.comparator(victim.value, value) !== 0) {
      return false;
    }

    // Values are unique, so matching by node identity is the same as matching by value
    for (let i = 0; i <= victim.level; i++) {
      if (update[i].forward[i] === victim) {
        update[i].forward[i] = victim.forward[i];
      }
    }

    while (this.level > 0 && this.head.forward[this.level] === null) {
      this.level--;
    }

    this.length--;
    return true;
  }

  clear(): void {
    this.head = new SkipListHead<T>(MAX_LEVEL);
    this.level = 0;
    this.length = 0;
  }

  /**
   * Iterator at value, or end() if absent.
   */
  find(value: T): SkipListIterator<T> {
    if (!this.isSelfEqual(value)) return this.end();
    const next = this.findPredecessors(value).forward[0];
    if (next !== null && this.comparator(next.value, value) === 0) {
      return new SkipListIterator(next);
    }
    return this.end();
  }

  begin(): SkipListIterator<T> {
    return new SkipListIterator(this.head.forward[0]);
  }

  end(): SkipListIterator<T> {
    return new SkipListIterator<T>(null);
  }

  cbegin(): ConstSkipListIterator<T> {
    return new ConstSkipListIterator(this.head.forward[0]);
  }

  cend(): ConstSkipListIterator<T> {
    return new ConstSkipListIterator<T>(null);
  }

  [Symbol.iterator](): SkipListIterator<T> {
    return this.begin();
  }

  toArray(): T[] {
    return Array.from(this);
  }

  /**
   * Values linked at one level, in order. Level 0 holds every element.
   */
  valuesAt(level: number): T[] {
    if (!Number.isInteger(level) || level < 0 || level > MAX_LEVEL) {
      throw new RangeError(`Level must be an integer in [0, ${MAX_LEVEL}]: ${level}`);
    }
    const result: T[] = [];
    let x = this.head.forward[level];
    while (x !== null) {
      result.push(x.value);
      x = x.forward[level];
    }
    return result;
  }

  equals(other: SkipList<T>): boolean {
    if (this === other) return true;
    if (this.length !== other.length) return false;

    let a = this.head.forward[0];
    let b = other.head.forward[0];
    while (a !== null && b !== null) {
      if (this.comparator(a.value, b.value) !== 0) return false;
      a = a.forward[0];
      b = b.forward[0];
    }
    return true;
  }

  lessThan(other: SkipList<T>): boolean {
    return this.lexicographicLess(this, other);
  }

  greaterThan(other: SkipList<T>): boolean {
    return this.lexicographicLess(other, this);
  }

  lessOrEqual(other: SkipList<T>): boolean {
    return !this.lexicographicLess(other, this);
  }

  greaterOrEqual(other: SkipList<T>): boolean {
    return !this.lexicographicLess(this, other);
  }

  /**
   * Three-way lexicographic comparison: -1, 0 or 1.
   */
  compare(other: SkipList<T>): number {
    if (this.lexicographicLess(this, other)) return -1;
    if (this.lexicographicLess(other, this)) return 1;
    return 0;
  }

  /**
   * Deep copy with the same comparator. Unless given its own random source the
   * copy shares this list's, so its inserts consume draws this list would see.
   */
  clone(random: RandomSource = this.random): SkipList<T> {
    const copy = new SkipList<T>({ compare: this.comparator, random });
    for (let x = this.head.forward[0]; x !== null; x = x.forward[0]) {
      copy.insert(x.value);
    }
    return copy;
  }

  /**
   * Replace contents with a deep copy of source's. Keeps this list's random source.
   */
  assign(source: SkipList<T>): this {
    if (source === this) return this;

    this.clear();
    this.comparator = source.comparator;
    for (let x = source.head.forward[0]; x !== null; x = x.forward[0]) {
      this.insert(x.value);
    }
    return this;
  }

  /**
   * Take over source's nodes and comparator, resetting source to empty.
   */
  moveFrom(source: SkipList<T>): this {
    if (source === this) return this;

    this.head = source.head;
    this.level = source.level;
    this.length = source.length;
    this.comparator = source.comparator;
    source.clear();
    return this;
  }

  toString(): string {
    return `{${this.toArray().map((value) => String(value)).join(', ')}}`;
  }

  [inspect.custom](): string {
    return this.toString();
  }

  private isSelfEqual(value: T): boolean {
    return this.comparator(value, value) === 0;
  }

  private newUpdateVector(): SkipListLinks<T>[] {
    return new Array<SkipListLinks<T>>(MAX_LEVEL + 1).fill(this.head);
  }

  /**
   * Walk down from the top level, stopping at each level before the first
   * node >= value. Records the predecessor per level in update when given
   * and returns the level-0 predecessor.
   */
  private findPredecessors(value: T, update?: SkipListLinks<T>[]): SkipListLinks<T> {
    let x: SkipListLinks<T> = this.head;

    for (let i = this.level; i >= 0; i--) {
      let next = x.forward[i];
      while (next !== null && this.comparator(next.value, value) < 0) {
        x = next;
        next = x.forward[i];
      }
      if (update) {
        update[i] = x;
      }
    }
    return x;
  }

  private lexicographicLess(a: SkipList<T>, b: SkipList<T>): boolean {
    let x = a.head.forward[0];
    let y = b.head.forward[0];
    while (x !== null && y !== null) {
      const cmp = this.comparator(x.value, y.value);
      if (cmp !== 0) return cmp < 0;
      x = x.forward[0];
      y = y.forward[0];
    }
    return x === null && y !== null;
  }
}
