/**
 * @file UART transmit engine (8N1).
 * @module uart/uart-tx
 */

import { stepDivider } from '../clock/clock-divider';
import type { Bit, Clocked } from '../clock/types';
import type { Fifo } from '../hw/fifo';
import { silentLogger, type Logger } from '../logging';

export type UartTxPhase = 'idle' | 'start' | 'data' | 'stop' | 'done';

export interface UartTxState {
  phase: UartTxPhase;
  /** Ticks elapsed in the current bit */
  count: number;
  /** Data bit on the line (data phase) */
  bitIndex: number;
  /** Byte being sent */
  shift: number;
}

export function initialUartTxState(): UartTxState {
  return { phase: 'idle', count: 0, bitIndex: 0, shift: 0 };
}

/**
 * Line level driven in a given state.
 */
export function uartTxLine(state: UartTxState): Bit {
  switch (state.phase) {
    case 'start':
      return 0;
    case 'data':
      return ((state.shift >> state.bitIndex) & 1) === 1 ? 1 : 0;
    default:
      return 1;
  }
}

/**
 * Computes the transmitter's next state. `popped` is the byte taken from the
 * FIFO this tick, if the caller granted one while idle.
 */
export function stepUartTx(
  state: UartTxState,
  popped: number | undefined,
  bitTicks: number
): UartTxState {
  if (state.phase === 'idle') {
    if (popped === undefined) {
      return state;
    }
    return { phase: 'start', count: 0, bitIndex: 0, shift: popped & 0xff };
  }
  if (state.phase === 'done') {
    return { ...state, phase: 'idle', count: 0 };
  }

  const bit = stepDivider(state.count, bitTicks);
  if (!bit.strobe) {
    return { ...state, count: bit.count };
  }
  switch (state.phase) {
    case 'start':
      return { ...state, phase: 'data', count: 0, bitIndex: 0 };
    case 'data':
      if (state.bitIndex >= 7) {
        return { ...state, phase: 'stop', count: 0 };
      }
      return { ...state, count: 0, bitIndex: state.bitIndex + 1 };
    default:
      return { ...state, phase: 'done', count: 0 };
  }
}

export interface UartTxOptions {
  /** Ticks per bit period */
  bitTicks: number;
  /** Source of bytes to send */
  fifo: Fifo<number>;
  logger?: Logger;
}

/**
 * UART transmitter: pops bytes from its FIFO and shifts them out LSB first.
 */
export class UartTx implements Clocked {
  private readonly fifo: Fifo<number>;
  private readonly bitTicks: number;
  private readonly logger: Logger;
  private state = initialUartTxState();
  private next = initialUartTxState();
  private framesSent = 0;

  constructor(options: UartTxOptions) {
    this.fifo = options.fifo;
    this.bitTicks = options.bitTicks;
    this.logger = options.logger ?? silentLogger;
  }

  /** Serial output line. */
  get line(): Bit {
    return uartTxLine(this.state);
  }

  get phase(): UartTxPhase {
    return this.state.phase;
  }

  /** True from the byte pop through the done step. */
  get busy(): boolean {
    return this.state.phase !== 'idle';
  }

  /** One-tick pulse after the stop bit. */
  get done(): boolean {
    return this.state.phase === 'done';
  }

  getFramesSent(): number {
    return this.framesSent;
  }

  evaluate(): void {
    const popped = this.state.phase === 'idle' ? this.fifo.stagePop() : undefined;
    this.next = stepUartTx(this.state, popped, this.bitTicks);
  }

  commit(): void {
    if (this.next.phase === 'done' && this.state.phase !== 'done') {
      this.framesSent += 1;
      this.logger.debug({ byte: this.next.shift }, 'uart tx frame sent');
    }
    this.state = this.next;
  }

  reset(): void {
    this.state = initialUartTxState();
    this.next = initialUartTxState();
    this.framesSent = 0;
  }
}
