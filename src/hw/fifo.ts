/**
 * @file Fixed-capacity circular FIFO with tick-atomic push/pop staging.
 * @module hw/fifo
 */

import { ConfigurationError } from '../errors';
import type { Clocked } from '../clock/types';

export interface FifoTransaction<T> {
  /** Whether the staged item was accepted */
  pushed: boolean;
  /** Head item removed by the pop, if any */
  popped: T | undefined;
}

/**
 * Circular buffer with exact count tracking.
 *
 * Between ticks `tryPush`/`tryPop` act immediately. Inside a tick the engines
 * use `stagePush`/`stagePop`, which decide against the state at the start of
 * the tick and take effect on `commit`, so a push and a pop in the same tick
 * never see each other.
 */
export class Fifo<T> implements Clocked {
  private readonly slots: (T | undefined)[];
  private head = 0;
  private count = 0;
  private stagedPush: { item: T } | undefined;
  private stagedPop = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw ConfigurationError.fromProblems('FIFO', [
        `capacity must be a positive integer, got ${capacity}`,
      ]);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.count;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  peek(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.slots[this.head];
  }

  /**
   * Appends an item. Returns false and changes nothing when full.
   */
  tryPush(item: T): boolean {
    if (this.isFull()) {
      return false;
    }
    this.slots[(this.head + this.count) % this.capacity] = item;
    this.count += 1;
    return true;
  }

  /**
   * Removes the head item. Returns undefined and changes nothing when empty.
   */
  tryPop(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count -= 1;
    return item;
  }

  /**
   * Same-tick push and pop. Both decisions use the state before either
   * operation: a full FIFO rejects the push even when the pop frees a slot,
   * and the pop never returns the item pushed in the same call.
   */
  transact(push: { item: T } | undefined, pop: boolean): FifoTransaction<T> {
    const accept = push !== undefined && !this.isFull();
    const popped = pop ? this.tryPop() : undefined;
    if (accept && push !== undefined) {
      this.tryPush(push.item);
    }
    return { pushed: accept, popped };
  }

  /**
   * Stages a push for the current tick.
   * @returns False when the FIFO was full at the start of the tick or a push is already staged
   */
  stagePush(item: T): boolean {
    if (this.isFull() || this.stagedPush !== undefined) {
      return false;
    }
    this.stagedPush = { item };
    return true;
  }

  /**
   * Stages a pop for the current tick and returns the item it will remove.
   */
  stagePop(): T | undefined {
    if (this.stagedPop || this.count === 0) {
      return undefined;
    }
    this.stagedPop = true;
    return this.peek();
  }

  evaluate(): void {
    // Staging happens while the owning engines evaluate.
  }

  commit(): void {
    if (this.stagedPush !== undefined || this.stagedPop) {
      this.transact(this.stagedPush, this.stagedPop);
    }
    this.stagedPush = undefined;
    this.stagedPop = false;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
    this.stagedPush = undefined;
    this.stagedPop = false;
  }

  reset(): void {
    this.clear();
  }

  /** Items from head to tail. */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) {
        items.push(item);
      }
    }
    return items;
  }
}
