/**
 * @file Mode-parameterised SPI master engine (CPOL/CPHA 0-3).
 * @module spi/spi-master
 */

import { stepDivider } from '../clock/clock-divider';
import type { Bit, Clocked, LineSource } from '../clock/types';
import { assertSpiConfig } from '../config/config-validation';
import type { SpiConfig, SpiMode } from '../config/types';
import { Synchronizer } from '../hw/synchronizer';
import { silentLogger, type Logger } from '../logging';

export type SpiPhase = 'idle' | 'transfer' | 'finish';

/**
 * Registered state of the master, including the pins it drives.
 */
export interface SpiMasterState {
  phase: SpiPhase;
  cpol: Bit;
  cpha: Bit;
  sclk: Bit;
  mosi: Bit;
  /** Chip select, active low */
  csN: Bit;
  /** Outgoing value */
  tx: number;
  /** Receive accumulator */
  rx: number;
  /** Bits sampled from MISO */
  bitCount: number;
  /** Bits driven onto MOSI */
  outIndex: number;
  /** Half-period divider counter */
  divCount: number;
  /** One-tick completion pulse */
  done: boolean;
}

/** A start request latched between ticks. */
export interface SpiStartRequest extends SpiMode {
  value: number;
}

export interface SpiMasterEffects {
  /** The pending start request was loaded this tick */
  accepted?: boolean;
  /** A transfer completed with this received value */
  completed?: number;
}

/**
 * Fixed master settings; the mode is the one SCLK idles in between transfers.
 */
export interface SpiTiming extends SpiMode {
  width: number;
  clockDivisor: number;
}

/**
 * Pin snapshot of the master side of the bus.
 */
export interface SpiLines {
  sclk: Bit;
  mosi: Bit;
  csN: Bit;
}

export function widthMask(width: number): number {
  return width >= 32 ? 0xffffffff : (1 << width) - 1;
}

function bitAt(value: number, index: number): Bit {
  return ((value >>> index) & 1) === 1 ? 1 : 0;
}

export function initialSpiMasterState(mode: SpiMode): SpiMasterState {
  return {
    phase: 'idle',
    cpol: mode.cpol,
    cpha: mode.cpha,
    sclk: mode.cpol,
    mosi: 0,
    csN: 1,
    tx: 0,
    rx: 0,
    bitCount: 0,
    outIndex: 0,
    divCount: 0,
    done: false,
  };
}

/**
 * Computes the master's next state from its registered state, the pending
 * start request and the synchronized MISO level. Pure: the caller owns the swap.
 */
export function stepSpiMaster(
  state: SpiMasterState,
  request: SpiStartRequest | undefined,
  miso: Bit,
  timing: SpiTiming
): { next: SpiMasterState; effects: SpiMasterEffects } {
  const { width, clockDivisor } = timing;
  const effects: SpiMasterEffects = {};

  switch (state.phase) {
    case 'idle': {
      if (request === undefined) {
        return { next: state.done ? { ...state, done: false } : state, effects };
      }
      const tx = (request.value & widthMask(width)) >>> 0;
      effects.accepted = true;
      return {
        next: {
          phase: 'transfer',
          cpol: request.cpol,
          cpha: request.cpha,
          sclk: request.cpol,
          // With CPHA=0 the first bit must be valid before the first edge.
          mosi: request.cpha === 0 ? bitAt(tx, width - 1) : 0,
          csN: 0,
          tx,
          rx: 0,
          bitCount: 0,
          outIndex: request.cpha === 0 ? 1 : 0,
          divCount: 0,
          done: false,
        },
        effects,
      };
    }

    case 'transfer': {
      const div = stepDivider(state.divCount, clockDivisor);
      const next: SpiMasterState = { ...state, divCount: div.count };
      if (!div.strobe) {
        return { next, effects };
      }
      const leading = state.sclk === state.cpol;
      next.sclk = state.sclk === 1 ? 0 : 1;
      const sampleEdge = leading === (state.cpha === 0);
      if (sampleEdge) {
        next.rx = (((state.rx << 1) | miso) & widthMask(width)) >>> 0;
        next.bitCount = state.bitCount + 1;
      } else if (state.outIndex < width) {
        next.mosi = bitAt(state.tx, width - 1 - state.outIndex);
        next.outIndex = state.outIndex + 1;
      }
      if (next.bitCount >= width && next.sclk === state.cpol) {
        next.phase = 'finish';
      }
      return { next, effects };
    }

    case 'finish': {
      effects.completed = state.rx;
      return {
        next: {
          ...state,
          phase: 'idle',
          cpol: timing.cpol,
          cpha: timing.cpha,
          sclk: timing.cpol,
          mosi: 0,
          csN: 1,
          bitCount: 0,
          outIndex: 0,
          divCount: 0,
          done: true,
        },
        effects,
      };
    }
  }
}

export interface SpiMasterOptions {
  config: SpiConfig;
  /** Raw MISO line; reads 1 until connected */
  miso?: LineSource;
  logger?: Logger;
}

const PULLED_UP: LineSource = () => 1;

/**
 * Single-transfer SPI master.
 *
 * `start` latches a request that is loaded on the next tick; `poll` returns
 * the received value once per completed transfer.
 */
export class SpiMaster implements Clocked {
  private readonly config: SpiConfig;
  private readonly logger: Logger;
  private readonly sync: Synchronizer;
  private state: SpiMasterState;
  private pending: { next: SpiMasterState; effects: SpiMasterEffects } | undefined;
  private request: SpiStartRequest | undefined;
  private result: number | undefined;
  private transfers = 0;

  constructor(options: SpiMasterOptions) {
    assertSpiConfig(options.config);
    this.config = { ...options.config };
    this.logger = options.logger ?? silentLogger;
    this.sync = new Synchronizer(options.miso ?? PULLED_UP, 1);
    this.state = initialSpiMasterState(this.config);
  }

  get width(): number {
    return this.config.width;
  }

  connectMiso(line: LineSource): void {
    this.sync.connect(line);
  }

  get phase(): SpiPhase {
    return this.state.phase;
  }

  /** A start is latched or a transfer is in flight. */
  get busy(): boolean {
    return this.request !== undefined || this.state.phase !== 'idle';
  }

  /** One-tick completion pulse. */
  get done(): boolean {
    return this.state.done;
  }

  get sclk(): Bit {
    return this.state.sclk;
  }

  get mosi(): Bit {
    return this.state.mosi;
  }

  get csN(): Bit {
    return this.state.csN;
  }

  get lines(): SpiLines {
    return { sclk: this.state.sclk, mosi: this.state.mosi, csN: this.state.csN };
  }

  /** Mode of the transfer in flight, or the configured mode while idle. */
  get mode(): SpiMode {
    return { cpol: this.state.cpol, cpha: this.state.cpha };
  }

  getTransferCount(): number {
    return this.transfers;
  }

  /**
   * Requests a transfer of `value`, optionally in a different mode.
   * @returns False, with no state change, while busy or while a completed
   * result has not been polled
   */
  start(value: number, mode?: Partial<SpiMode>): boolean {
    if (this.busy || this.result !== undefined) {
      this.logger.debug({ value }, 'spi start rejected');
      return false;
    }
    this.request = {
      value,
      cpol: mode?.cpol ?? this.config.cpol,
      cpha: mode?.cpha ?? this.config.cpha,
    };
    return true;
  }

  /**
   * Returns the received value of a completed transfer, exactly once.
   */
  poll(): number | undefined {
    const result = this.result;
    this.result = undefined;
    return result;
  }

  evaluate(): void {
    this.pending = stepSpiMaster(this.state, this.request, this.sync.value, this.config);
    this.sync.evaluate();
  }

  commit(): void {
    this.sync.commit();
    if (this.pending === undefined) {
      return;
    }
    const { next, effects } = this.pending;
    this.pending = undefined;
    this.state = next;
    if (effects.accepted) {
      this.request = undefined;
    }
    if (effects.completed !== undefined) {
      this.result = effects.completed;
      this.transfers += 1;
      this.logger.debug(
        { received: effects.completed, cpol: next.cpol, cpha: next.cpha },
        'spi transfer complete'
      );
    }
  }

  reset(): void {
    this.sync.reset();
    this.state = initialSpiMasterState(this.config);
    this.pending = undefined;
    this.request = undefined;
    this.result = undefined;
    this.transfers = 0;
  }
}
