import type { SkipListNode } from './SkipListNode.js';

/**
 * Read-only forward iterator over level 0 of a SkipList.
 * A null node marks the end position.
 *
 * Equality is by node identity, so a const iterator compares equal to a
 * mutable one at the same position. Any insert or erase touching the current
 * node invalidates the iterator; this is not detected.
 */
export class ConstSkipListIterator<T> implements IterableIterator<Readonly<T>> {
  protected node: SkipListNode<T> | null;

  constructor(node: SkipListNode<T> | null) {
    this.node = node;
  }

  static from<T>(it: ConstSkipListIterator<T>): ConstSkipListIterator<T> {
    return new ConstSkipListIterator(it.node);
  }

  get done(): boolean {
    return this.node === null;
  }

  /**
   * Element at the current position. Throws RangeError at the end.
   */
  get value(): Readonly<T> {
    return this.current().value;
  }

  /**
   * Advance one position (prefix increment). Stays put at the end.
   */
  increment(): this {
    this.step();
    return this;
  }

  /**
   * Advance one position, returning a copy left at the old position.
   */
  postIncrement(): ConstSkipListIterator<T> {
    const old = this.clone();
    this.step();
    return old;
  }

  clone(): ConstSkipListIterator<T> {
    return new ConstSkipListIterator(this.node);
  }

  equals(other: ConstSkipListIterator<T>): boolean {
    return this.node === other.node;
  }

  next(): IteratorResult<Readonly<T>> {
    const node = this.step();
    return node === null ? { done: true, value: undefined } : { done: false, value: node.value };
  }

  [Symbol.iterator](): this {
    return this;
  }

  protected current(): SkipListNode<T> {
    if (this.node === null) {
      throw new RangeError('Cannot dereference an end iterator');
    }
    return this.node;
  }

  /**
   * Move to the level-0 successor. Returns the node that was current.
   */
  protected step(): SkipListNode<T> | null {
    const node = this.node;
    if (node !== null) {
      this.node = node.forward[0];
    }
    return node;
  }
}

/**
 * Forward iterator handing out elements as stored.
 * Mutating an element in a way that changes its ordering breaks the list.
 */
export class SkipListIterator<T> extends ConstSkipListIterator<T> implements IterableIterator<T> {
  get value(): T {
    return this.current().value;
  }

  postIncrement(): SkipListIterator<T> {
    const old = this.clone();
    this.step();
    return old;
  }

  clone(): SkipListIterator<T> {
    return new SkipListIterator(this.node);
  }

  toConst(): ConstSkipListIterator<T> {
    return new ConstSkipListIterator(this.node);
  }

  next(): IteratorResult<T> {
    const node = this.step();
    return node === null ? { done: true, value: undefined } : { done: false, value: node.value };
  }
}
