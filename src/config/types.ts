/**
 * @file Configuration shapes and defaults for the serial engines.
 * @module config/types
 */

import type { Bit } from '../clock/types';
import type { LogLevel } from '../logging';

/**
 * SPI clock polarity and phase.
 */
export interface SpiMode {
  /** Idle level of SCLK */
  cpol: Bit;
  /** 0: sample on the leading edge; 1: sample on the trailing edge */
  cpha: Bit;
}

export interface SpiConfig extends SpiMode {
  /** Bits per transfer (1-32) */
  width: number;
  /** Ticks between SCLK toggles; the SCLK period is twice this */
  clockDivisor: number;
}

export interface UartConfig {
  baud: number;
  /** Sample ticks per bit (even) */
  oversample: number;
  /** Capacity of each of the RX and TX FIFOs */
  fifoDepth: number;
}

export interface SerialConfig {
  /** Reference tick rate */
  clockHz: number;
  uart: UartConfig;
  spi: SpiConfig;
  logLevel: LogLevel;
}

/**
 * Partial configuration as accepted from callers and config files.
 */
export interface SerialConfigInput {
  clockHz?: number;
  uart?: Partial<UartConfig>;
  spi?: Partial<SpiConfig>;
  logLevel?: LogLevel;
}

export const DEFAULT_CLOCK_HZ = 50_000_000;
export const DEFAULT_BAUD = 115_200;
export const DEFAULT_OVERSAMPLE = 16;
export const DEFAULT_FIFO_DEPTH = 16;
export const DEFAULT_SPI_WIDTH = 8;
export const DEFAULT_SPI_CLOCK_DIVISOR = 4;

export const DEFAULT_SERIAL_CONFIG: SerialConfig = {
  clockHz: DEFAULT_CLOCK_HZ,
  uart: {
    baud: DEFAULT_BAUD,
    oversample: DEFAULT_OVERSAMPLE,
    fifoDepth: DEFAULT_FIFO_DEPTH,
  },
  spi: {
    width: DEFAULT_SPI_WIDTH,
    cpol: 0,
    cpha: 0,
    clockDivisor: DEFAULT_SPI_CLOCK_DIVISOR,
  },
  logLevel: 'silent',
};
