/**
 * @file Top-level serial system: UART, SPI master and dispatcher on one tick source.
 * @module system/serial-system
 */

import { TickSource } from '../clock/tick-source';
import type { Bit, LineSource } from '../clock/types';
import { loadSerialConfig } from '../config/config-loader';
import { normalizeSerialConfig, validateSerialConfig } from '../config/config-validation';
import type { SerialConfig, SerialConfigInput } from '../config/types';
import { Dispatcher } from '../dispatch/dispatcher';
import { createLogger, type Logger } from '../logging';
import { SpiMaster, type SpiLines } from '../spi/spi-master';
import { Uart } from '../uart/uart';
import { packStatus, type StatusSnapshot } from './status';

export interface SerialSystemOptions {
  config?: SerialConfigInput;
  /** Overrides the logger built from config.logLevel */
  logger?: Logger;
  /** Run the command dispatcher after every tick (default true) */
  dispatch?: boolean;
}

export interface SerialCounters {
  framesReceived: number;
  frameErrors: number;
  overruns: number;
  framesSent: number;
  spiTransfers: number;
  commandsHandled: number;
}

/**
 * Wires the UART and SPI engines to one tick source, with the dispatcher
 * routing command bytes between them.
 */
export class SerialSystem {
  readonly config: SerialConfig;
  readonly clock = new TickSource();
  readonly uart: Uart;
  readonly spi: SpiMaster;
  readonly dispatcher: Dispatcher;
  private readonly logger: Logger;
  private readonly dispatch: boolean;

  constructor(options: SerialSystemOptions = {}) {
    this.config = normalizeSerialConfig(options.config);
    this.logger = options.logger ?? createLogger({ level: this.config.logLevel });
    this.dispatch = options.dispatch ?? true;
    for (const warning of validateSerialConfig(this.config).warnings) {
      this.logger.warn(warning);
    }

    this.uart = new Uart({
      clockHz: this.config.clockHz,
      ...this.config.uart,
      logger: this.logger.child({ block: 'uart' }),
    });
    this.spi = new SpiMaster({
      config: this.config.spi,
      logger: this.logger.child({ block: 'spi' }),
    });
    this.dispatcher = new Dispatcher({
      rx: this.uart,
      tx: this.uart,
      spi: this.spi,
      status: () => this.packedStatus(),
      logger: this.logger.child({ block: 'dispatcher' }),
    });

    this.uart.attach(this.clock);
    this.clock.register(this.spi);
  }

  /**
   * Builds a system from the configuration file found from startDir.
   */
  static fromConfigFile(
    startDir: string,
    options: Omit<SerialSystemOptions, 'config'> & { overrides?: SerialConfigInput } = {}
  ): SerialSystem {
    const config = loadSerialConfig(startDir, options.overrides);
    return new SerialSystem({ ...options, config });
  }

  now(): number {
    return this.clock.now();
  }

  /**
   * Advances every engine by `count` ticks; the dispatcher steps after each.
   */
  tick(count = 1): void {
    for (let i = 0; i < count; i += 1) {
      this.clock.advance(1);
      if (this.dispatch) {
        this.dispatcher.step();
      }
    }
  }

  /**
   * Returns every engine to idle, drops in-flight frames and transfers,
   * clears FIFOs, latches and counters, and restarts the tick count.
   */
  reset(): void {
    this.clock.reset();
    this.dispatcher.reset();
    this.logger.debug('serial system reset');
  }

  connectRx(line: LineSource): void {
    this.uart.connectRx(line);
  }

  connectMiso(line: LineSource): void {
    this.spi.connectMiso(line);
  }

  get txLine(): Bit {
    return this.uart.txLine;
  }

  get spiLines(): SpiLines {
    return this.spi.lines;
  }

  status(): StatusSnapshot {
    return {
      frameError: this.uart.rx.frameError,
      rxFifoFull: this.uart.rxFifo.isFull(),
      spiBusy: this.spi.busy,
      spiDone: this.spi.done,
      txBusy: this.uart.tx.busy,
      txDone: this.uart.tx.done,
      rxReady: !this.uart.rxFifo.isEmpty(),
    };
  }

  packedStatus(): number {
    return packStatus(this.status());
  }

  counters(): SerialCounters {
    return {
      ...this.uart.getCounters(),
      spiTransfers: this.spi.getTransferCount(),
      commandsHandled: this.dispatcher.getHandledCount(),
    };
  }
}
