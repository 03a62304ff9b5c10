/**
 * @file Status snapshot and its packed byte form.
 * @module system/status
 */

export interface StatusSnapshot {
  frameError: boolean;
  rxFifoFull: boolean;
  spiBusy: boolean;
  spiDone: boolean;
  txBusy: boolean;
  txDone: boolean;
  rxReady: boolean;
}

export const STATUS_RX_READY = 0x01;
export const STATUS_RX_FIFO_FULL = 0x02;
export const STATUS_FRAME_ERROR = 0x04;
export const STATUS_TX_BUSY = 0x08;
export const STATUS_TX_DONE = 0x10;
export const STATUS_SPI_BUSY = 0x20;
export const STATUS_SPI_DONE = 0x40;

const STATUS_BITS: readonly [keyof StatusSnapshot, number][] = [
  ['rxReady', STATUS_RX_READY],
  ['rxFifoFull', STATUS_RX_FIFO_FULL],
  ['frameError', STATUS_FRAME_ERROR],
  ['txBusy', STATUS_TX_BUSY],
  ['txDone', STATUS_TX_DONE],
  ['spiBusy', STATUS_SPI_BUSY],
  ['spiDone', STATUS_SPI_DONE],
];

export function packStatus(status: StatusSnapshot): number {
  let value = 0;
  for (const [key, mask] of STATUS_BITS) {
    if (status[key]) {
      value |= mask;
    }
  }
  return value;
}

export function unpackStatus(value: number): StatusSnapshot {
  return {
    frameError: (value & STATUS_FRAME_ERROR) !== 0,
    rxFifoFull: (value & STATUS_RX_FIFO_FULL) !== 0,
    spiBusy: (value & STATUS_SPI_BUSY) !== 0,
    spiDone: (value & STATUS_SPI_DONE) !== 0,
    txBusy: (value & STATUS_TX_BUSY) !== 0,
    txDone: (value & STATUS_TX_DONE) !== 0,
    rxReady: (value & STATUS_RX_READY) !== 0,
  };
}
