/**
 * @file Shared signal and clocking contracts.
 * @module clock/types
 */

/** Logic level of a serial line at a tick boundary. */
export type Bit = 0 | 1;

/** Reads the level a line holds at the current tick boundary. */
export type LineSource = () => Bit;

/**
 * A synchronous component advanced by the tick source.
 *
 * `evaluate` computes the next state from committed state only and must not
 * change anything another component can observe; `commit` then makes that
 * state current. All components evaluate before any of them commits.
 */
export interface Clocked {
  evaluate(): void;
  commit(): void;
  reset(): void;
}

/**
 * An externally driven line, set between ticks by a test bench or host.
 */
export class Line {
  private level: Bit;

  constructor(initial: Bit = 1) {
    this.level = initial;
  }

  /** Bound reader suitable for passing as a LineSource. */
  readonly read: LineSource = () => this.level;

  set(level: Bit): void {
    this.level = level;
  }

  get value(): Bit {
    return this.level;
  }
}

/**
 * Normalises a truthy/falsy value to a Bit.
 */
export function toBit(value: number | boolean): Bit {
  return value ? 1 : 0;
}
