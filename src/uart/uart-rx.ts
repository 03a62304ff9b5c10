/**
 * @file Oversampled UART receive engine (8N1).
 * @module uart/uart-rx
 */

import { stepDivider } from '../clock/clock-divider';
import type { Bit, Clocked, LineSource } from '../clock/types';
import { Synchronizer } from '../hw/synchronizer';
import type { Fifo } from '../hw/fifo';
import { silentLogger, type Logger } from '../logging';

export type UartRxPhase = 'idle' | 'startConfirm' | 'dataBits' | 'stopCheck';

/**
 * Registered state of the receiver.
 */
export interface UartRxState {
  phase: UartRxPhase;
  /** Free-running sample-tick divider counter */
  divCount: number;
  /** Sample ticks elapsed in the current phase */
  sub: number;
  /** Data bit being captured (dataBits phase) */
  bitIndex: number;
  /** Data bits captured so far, LSB first */
  shift: number;
  /** One-tick pulse set when the stop bit sampled 0 */
  frameError: boolean;
}

/**
 * What one receiver tick asks of the outside world.
 */
export interface UartRxEffects {
  /** A valid frame finished with this byte */
  received?: number;
  /** A frame ended with a 0 stop bit */
  frameError?: boolean;
}

export interface UartRxTiming {
  /** Ticks per sample tick */
  sampleDivisor: number;
  /** Sample ticks per bit */
  oversample: number;
}

export function initialUartRxState(): UartRxState {
  return {
    phase: 'idle',
    divCount: 0,
    sub: 0,
    bitIndex: 0,
    shift: 0,
    frameError: false,
  };
}

/**
 * Computes the receiver's next state from its registered state and the
 * synchronized line level. Pure: the caller owns the swap.
 */
export function stepUartRx(
  state: UartRxState,
  rx: Bit,
  timing: UartRxTiming
): { next: UartRxState; effects: UartRxEffects } {
  const div = stepDivider(state.divCount, timing.sampleDivisor);
  const next: UartRxState = { ...state, divCount: div.count, frameError: false };
  const effects: UartRxEffects = {};
  if (!div.strobe) {
    return { next, effects };
  }

  const ovr = timing.oversample;
  switch (state.phase) {
    case 'idle': {
      if (rx === 0) {
        next.phase = 'startConfirm';
        next.sub = 0;
      }
      break;
    }
    case 'startConfirm': {
      if (state.sub < ovr / 2 - 1) {
        next.sub = state.sub + 1;
        break;
      }
      next.sub = 0;
      if (rx === 0) {
        next.phase = 'dataBits';
        next.bitIndex = 0;
        next.shift = 0;
      } else {
        next.phase = 'idle';
      }
      break;
    }
    case 'dataBits': {
      if (state.sub < ovr - 1) {
        next.sub = state.sub + 1;
        break;
      }
      next.sub = 0;
      next.shift = (state.shift | (rx << state.bitIndex)) & 0xff;
      if (state.bitIndex >= 7) {
        next.phase = 'stopCheck';
      } else {
        next.bitIndex = state.bitIndex + 1;
      }
      break;
    }
    case 'stopCheck': {
      if (state.sub < ovr - 1) {
        next.sub = state.sub + 1;
        break;
      }
      next.sub = 0;
      next.phase = 'idle';
      if (rx === 1) {
        effects.received = state.shift;
      } else {
        next.frameError = true;
        effects.frameError = true;
      }
      break;
    }
  }
  return { next, effects };
}

/** A byte as queued in the receive FIFO. */
export interface UartReceived {
  byte: number;
  /** A frame was discarded for a bad stop bit between the previous byte and this one */
  frameError: boolean;
}

export interface UartRxCounters {
  framesReceived: number;
  frameErrors: number;
  overruns: number;
}

export interface UartRxOptions extends UartRxTiming {
  /** Raw receive line */
  line: LineSource;
  /** Destination for received bytes */
  fifo: Fifo<UartReceived>;
  logger?: Logger;
}

/**
 * UART receiver: synchronizer, oversampling state machine and FIFO writer.
 */
export class UartRx implements Clocked {
  private readonly sync: Synchronizer;
  private readonly fifo: Fifo<UartReceived>;
  private readonly timing: UartRxTiming;
  private readonly logger: Logger;
  private state = initialUartRxState();
  private pending: { next: UartRxState; effects: UartRxEffects; dropped: boolean } | undefined;
  private counters: UartRxCounters = { framesReceived: 0, frameErrors: 0, overruns: 0 };
  /** Set by a frame error, carried by the next byte queued */
  private frameErrorLatch = false;

  constructor(options: UartRxOptions) {
    this.sync = new Synchronizer(options.line, 1);
    this.fifo = options.fifo;
    this.timing = { sampleDivisor: options.sampleDivisor, oversample: options.oversample };
    this.logger = options.logger ?? silentLogger;
  }

  connect(line: LineSource): void {
    this.sync.connect(line);
  }

  get phase(): UartRxPhase {
    return this.state.phase;
  }

  /** True only on the tick after a stop bit sampled 0. */
  get frameError(): boolean {
    return this.state.frameError;
  }

  /** Receiving a frame (start confirmed or being confirmed). */
  get busy(): boolean {
    return this.state.phase !== 'idle';
  }

  getCounters(): UartRxCounters {
    return { ...this.counters };
  }

  evaluate(): void {
    const { next, effects } = stepUartRx(this.state, this.sync.value, this.timing);
    let dropped = false;
    if (effects.received !== undefined) {
      dropped = !this.fifo.stagePush({
        byte: effects.received,
        frameError: this.frameErrorLatch,
      });
    }
    this.pending = { next, effects, dropped };
    this.sync.evaluate();
  }

  commit(): void {
    this.sync.commit();
    if (this.pending === undefined) {
      return;
    }
    const { next, effects, dropped } = this.pending;
    this.pending = undefined;
    this.state = next;
    if (effects.received !== undefined) {
      if (dropped) {
        this.counters.overruns += 1;
        this.logger.debug({ byte: effects.received }, 'uart rx overrun, byte dropped');
      } else {
        this.counters.framesReceived += 1;
        this.frameErrorLatch = false;
      }
    }
    if (effects.frameError) {
      this.counters.frameErrors += 1;
      this.frameErrorLatch = true;
      this.logger.debug('uart rx frame error');
    }
  }

  reset(): void {
    this.sync.reset();
    this.state = initialUartRxState();
    this.pending = undefined;
    this.frameErrorLatch = false;
    this.counters = { framesReceived: 0, frameErrors: 0, overruns: 0 };
  }
}
