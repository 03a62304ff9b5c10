/**
 * @file Tick divider used for UART sample ticks, bit periods and SPI half periods.
 * @module clock/clock-divider
 */

export interface DividerStep {
  /** Counter value after this tick */
  count: number;
  /** True on the tick the divider wraps */
  strobe: boolean;
}

/**
 * Advances a divide-by-`divisor` counter by one tick.
 *
 * The strobe fires on the `divisor`-th tick after the counter was last zero,
 * so a divisor of 1 strobes on every tick.
 */
export function stepDivider(count: number, divisor: number): DividerStep {
  if (count >= divisor - 1) {
    return { count: 0, strobe: true };
  }
  return { count: count + 1, strobe: false };
}

/**
 * Ticks per oversample strobe for a UART receiver.
 * @returns The integer divisor, or 0 when the tick rate is too low
 */
export function sampleDivisor(clockHz: number, baud: number, oversample: number): number {
  if (clockHz <= 0 || baud <= 0 || oversample <= 0) {
    return 0;
  }
  return Math.floor(clockHz / (baud * oversample));
}

/**
 * Baud rate actually produced by an integer sample divisor.
 */
export function effectiveBaud(clockHz: number, divisor: number, oversample: number): number {
  if (divisor <= 0 || oversample <= 0) {
    return 0;
  }
  return clockHz / (divisor * oversample);
}
