/**
 * @file UART block: receive and transmit engines with their FIFOs.
 * @module uart/uart
 */

import { sampleDivisor } from '../clock/clock-divider';
import type { Bit, Clocked, LineSource } from '../clock/types';
import type { TickSource } from '../clock/tick-source';
import { assertUartConfig } from '../config/config-validation';
import { Fifo } from '../hw/fifo';
import { silentLogger, type Logger } from '../logging';
import { UartRx, type UartReceived, type UartRxCounters } from './uart-rx';
import { UartTx } from './uart-tx';

export interface UartOptions {
  clockHz: number;
  baud: number;
  oversample: number;
  fifoDepth: number;
  /** Raw receive line; idles high until connected */
  rxLine?: LineSource;
  logger?: Logger;
}

export type { UartReceived };

export interface UartCounters extends UartRxCounters {
  framesSent: number;
}

const IDLE_LINE: LineSource = () => 1;

/**
 * Byte-level UART: `submit` feeds the transmitter, `pollByte` drains the
 * receiver. Both act immediately and are meant to be called between ticks.
 */
export class Uart {
  readonly rxFifo: Fifo<UartReceived>;
  readonly txFifo: Fifo<number>;
  readonly rx: UartRx;
  readonly tx: UartTx;
  readonly sampleDivisor: number;
  readonly bitTicks: number;

  constructor(options: UartOptions) {
    assertUartConfig(options.clockHz, {
      baud: options.baud,
      oversample: options.oversample,
      fifoDepth: options.fifoDepth,
    });
    const divisor = sampleDivisor(options.clockHz, options.baud, options.oversample);
    const logger = options.logger ?? silentLogger;
    this.sampleDivisor = divisor;
    this.bitTicks = divisor * options.oversample;
    this.rxFifo = new Fifo<UartReceived>(options.fifoDepth);
    this.txFifo = new Fifo<number>(options.fifoDepth);
    this.rx = new UartRx({
      line: options.rxLine ?? IDLE_LINE,
      fifo: this.rxFifo,
      sampleDivisor: divisor,
      oversample: options.oversample,
      logger,
    });
    this.tx = new UartTx({ bitTicks: this.bitTicks, fifo: this.txFifo, logger });
  }

  /** Components to register with a tick source. */
  get components(): readonly Clocked[] {
    return [this.rx, this.tx, this.rxFifo, this.txFifo];
  }

  attach(clock: TickSource): void {
    for (const component of this.components) {
      clock.register(component);
    }
  }

  connectRx(line: LineSource): void {
    this.rx.connect(line);
  }

  /** Transmit line level. */
  get txLine(): Bit {
    return this.tx.line;
  }

  /**
   * Queues a byte for transmission.
   * @returns False iff the transmit FIFO is full
   */
  submit(byte: number): boolean {
    return this.txFifo.tryPush(byte & 0xff);
  }

  /**
   * Takes the oldest received byte, if any, with the frame error flag it was queued with.
   */
  pollByte(): UartReceived | undefined {
    return this.rxFifo.tryPop();
  }

  getCounters(): UartCounters {
    return { ...this.rx.getCounters(), framesSent: this.tx.getFramesSent() };
  }
}
