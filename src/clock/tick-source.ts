/**
 * @file Discrete tick driver with two-phase evaluate/commit stepping.
 * @module clock/tick-source
 */

import type { Clocked } from './types';

export type TickCallback = (tick: number) => void;

interface TickEvent {
  id: number;
  at: number;
  interval?: number;
  callback: TickCallback;
}

/**
 * Advances a set of clocked components in lockstep.
 *
 * Each step fires the events due at the current tick (line stimulus, host
 * activity), evaluates every component, commits every component and then
 * increments the tick counter.
 */
export class TickSource {
  private nowTicks = 0;
  private nextId = 1;
  private queue: TickEvent[] = [];
  private components: Clocked[] = [];

  now(): number {
    return this.nowTicks;
  }

  /**
   * Registers a component. Registration order has no effect on results.
   */
  register(component: Clocked): void {
    if (!this.components.includes(component)) {
      this.components.push(component);
    }
  }

  unregister(component: Clocked): boolean {
    const index = this.components.indexOf(component);
    if (index === -1) {
      return false;
    }
    this.components.splice(index, 1);
    return true;
  }

  /**
   * Runs the callback before the components evaluate on tick `at`.
   */
  scheduleAt(at: number, callback: TickCallback): number {
    const event: TickEvent = {
      id: this.nextId++,
      at: Math.max(this.nowTicks, at),
      callback,
    };
    this.insertEvent(event);
    return event.id;
  }

  scheduleIn(delta: number, callback: TickCallback): number {
    return this.scheduleAt(this.nowTicks + Math.max(0, delta), callback);
  }

  scheduleEvery(interval: number, callback: TickCallback): number {
    const safeInterval = Math.max(1, interval);
    const event: TickEvent = {
      id: this.nextId++,
      at: this.nowTicks + safeInterval,
      interval: safeInterval,
      callback,
    };
    this.insertEvent(event);
    return event.id;
  }

  cancel(id: number): boolean {
    const index = this.queue.findIndex((event) => event.id === id);
    if (index === -1) {
      return false;
    }
    this.queue.splice(index, 1);
    return true;
  }

  advance(ticks = 1): void {
    for (let i = 0; i < ticks; i += 1) {
      this.step();
    }
  }

  /**
   * Returns to tick 0, drops pending events and resets every component.
   */
  reset(): void {
    this.nowTicks = 0;
    this.queue = [];
    for (const component of this.components) {
      component.reset();
    }
  }

  private step(): void {
    this.fireDueEvents();
    for (const component of this.components) {
      component.evaluate();
    }
    for (const component of this.components) {
      component.commit();
    }
    this.nowTicks += 1;
  }

  private fireDueEvents(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (next === undefined || next.at > this.nowTicks) {
        break;
      }
      this.queue.shift();
      next.callback(this.nowTicks);
      if (next.interval !== undefined && next.interval > 0) {
        next.at += next.interval;
        this.insertEvent(next);
      }
    }
  }

  private insertEvent(event: TickEvent): void {
    if (this.queue.length === 0) {
      this.queue.push(event);
      return;
    }
    const index = this.queue.findIndex((item) => item.at > event.at);
    if (index === -1) {
      this.queue.push(event);
    } else {
      this.queue.splice(index, 0, event);
    }
  }
}
