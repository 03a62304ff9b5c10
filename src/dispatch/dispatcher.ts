/**
 * @file Command sequencer between the UART byte stream and the SPI master.
 * @module dispatch/dispatcher
 */

import type { SpiMode } from '../config/types';
import { silentLogger, type Logger } from '../logging';
import {
  READ_FILLER,
  REPLY_ACK,
  REPLY_NAK,
  decodeCommand,
  takesOperand,
  type CommandName,
} from './commands';

export type DispatcherPhase =
  | 'idle'
  | 'commandReceived'
  | 'awaitingSpiDataByte'
  | 'spiExecuting'
  | 'awaitingSpiResult'
  | 'resultReady';

/** Receive side of the UART as seen by the dispatcher. */
export interface ByteSource {
  pollByte(): { byte: number } | undefined;
}

/** Transmit side of the UART as seen by the dispatcher. */
export interface ByteSink {
  submit(byte: number): boolean;
}

/** The SPI master operations the dispatcher drives. */
export interface SpiPort {
  start(value: number, mode?: Partial<SpiMode>): boolean;
  poll(): number | undefined;
}

export interface DispatcherOptions {
  rx: ByteSource;
  tx: ByteSink;
  spi: SpiPort;
  /** Packed status byte for STATUS */
  status: () => number;
  logger?: Logger;
}

interface DispatcherState {
  phase: DispatcherPhase;
  opcode: number;
  command: CommandName | undefined;
  data: number;
  reply: number;
}

function idleState(): DispatcherState {
  return { phase: 'idle', opcode: 0, command: undefined, data: 0, reply: 0 };
}

/**
 * Runs one step per tick after the engines commit, using only the
 * between-tick APIs: UART poll/submit and SPI start/poll.
 */
export class Dispatcher {
  private readonly rx: ByteSource;
  private readonly tx: ByteSink;
  private readonly spi: SpiPort;
  private readonly status: () => number;
  private readonly logger: Logger;
  private state: DispatcherState = idleState();
  private handled = 0;

  constructor(options: DispatcherOptions) {
    this.rx = options.rx;
    this.tx = options.tx;
    this.spi = options.spi;
    this.status = options.status;
    this.logger = options.logger ?? silentLogger;
  }

  get phase(): DispatcherPhase {
    return this.state.phase;
  }

  /** Commands whose reply has been queued for transmission. */
  getHandledCount(): number {
    return this.handled;
  }

  step(): void {
    const s = this.state;
    switch (s.phase) {
      case 'idle': {
        const received = this.rx.pollByte();
        if (received !== undefined) {
          this.state = { ...s, phase: 'commandReceived', opcode: received.byte & 0xff };
        }
        return;
      }
      case 'commandReceived': {
        const command = decodeCommand(s.opcode);
        if (command === undefined) {
          this.logger.debug({ opcode: s.opcode }, 'dispatcher unknown opcode');
          this.state = { ...s, phase: 'resultReady', command, reply: REPLY_NAK };
          return;
        }
        this.logger.debug({ command }, 'dispatcher command');
        if (takesOperand(command)) {
          this.state = { ...s, phase: 'awaitingSpiDataByte', command };
        } else if (command === 'read') {
          this.state = { ...s, phase: 'spiExecuting', command, data: READ_FILLER };
        } else {
          this.state = { ...s, phase: 'resultReady', command, reply: this.status() & 0xff };
        }
        return;
      }
      case 'awaitingSpiDataByte': {
        const received = this.rx.pollByte();
        if (received === undefined) {
          return;
        }
        const data = received.byte & 0xff;
        this.state =
          s.command === 'echo'
            ? { ...s, phase: 'resultReady', data, reply: data }
            : { ...s, phase: 'spiExecuting', data };
        return;
      }
      case 'spiExecuting': {
        if (this.spi.start(s.data)) {
          this.state = { ...s, phase: 'awaitingSpiResult' };
        }
        return;
      }
      case 'awaitingSpiResult': {
        const value = this.spi.poll();
        if (value === undefined) {
          return;
        }
        const reply = s.command === 'write' ? REPLY_ACK : value & 0xff;
        this.state = { ...s, phase: 'resultReady', reply };
        return;
      }
      case 'resultReady': {
        if (this.tx.submit(s.reply)) {
          this.handled += 1;
          this.state = idleState();
        }
        return;
      }
    }
  }

  reset(): void {
    this.state = idleState();
    this.handled = 0;
  }
}
