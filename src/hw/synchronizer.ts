/**
 * @file Two-flop synchronizer for asynchronous input lines.
 * @module hw/synchronizer
 */

import type { Bit, Clocked, LineSource } from '../clock/types';

/**
 * Samples a raw line into the tick domain through two registers.
 *
 * Each tick stage 1 takes the raw level and stage 2 takes stage 1's previous
 * value, so `value` lags the raw line by exactly two ticks.
 */
export class Synchronizer implements Clocked {
  private stage1: Bit;
  private stage2: Bit;
  private next1: Bit;
  private next2: Bit;

  constructor(
    private source: LineSource,
    private readonly resetLevel: Bit = 1
  ) {
    this.stage1 = resetLevel;
    this.stage2 = resetLevel;
    this.next1 = resetLevel;
    this.next2 = resetLevel;
  }

  /** Synchronized level (stage 2). */
  get value(): Bit {
    return this.stage2;
  }

  /** Replaces the raw line this synchronizer samples. */
  connect(source: LineSource): void {
    this.source = source;
  }

  evaluate(): void {
    this.next1 = this.source();
    this.next2 = this.stage1;
  }

  commit(): void {
    this.stage1 = this.next1;
    this.stage2 = this.next2;
  }

  reset(): void {
    this.stage1 = this.resetLevel;
    this.stage2 = this.resetLevel;
    this.next1 = this.resetLevel;
    this.next2 = this.resetLevel;
  }

  /**
   * Standalone form: clocks `raw` in for one tick and returns stage 2.
   */
  sample(raw: Bit): Bit {
    this.next1 = raw;
    this.next2 = this.stage1;
    this.commit();
    return this.stage2;
  }
}
