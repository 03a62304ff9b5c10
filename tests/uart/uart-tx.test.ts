/**
 * @file UART transmit engine tests
 */

import { describe, it, expect } from 'vitest';
import { TickSource } from '../../src/clock/tick-source';
import type { Bit } from '../../src/clock/types';
import { Fifo } from '../../src/hw/fifo';
import { UartTx, stepUartTx, uartTxLine, initialUartTxState } from '../../src/uart/uart-tx';

function createTx(bitTicks = 16): { clock: TickSource; fifo: Fifo<number>; tx: UartTx } {
  const clock = new TickSource();
  const fifo = new Fifo<number>(4);
  const tx = new UartTx({ bitTicks, fifo });
  clock.register(tx);
  clock.register(fifo);
  return { clock, fifo, tx };
}

describe('uartTxLine', () => {
  it('should drive the line from the phase', () => {
    const base = initialUartTxState();
    expect(uartTxLine(base)).toBe(1);
    expect(uartTxLine({ ...base, phase: 'start' })).toBe(0);
    expect(uartTxLine({ ...base, phase: 'data', shift: 0b10, bitIndex: 1 })).toBe(1);
    expect(uartTxLine({ ...base, phase: 'data', shift: 0b10, bitIndex: 0 })).toBe(0);
    expect(uartTxLine({ ...base, phase: 'stop' })).toBe(1);
    expect(uartTxLine({ ...base, phase: 'done' })).toBe(1);
  });
});

describe('stepUartTx', () => {
  it('should stay idle without a byte', () => {
    const state = initialUartTxState();
    expect(stepUartTx(state, undefined, 16)).toBe(state);
  });

  it('should load a popped byte into the start bit', () => {
    expect(stepUartTx(initialUartTxState(), 0x1ff, 16)).toEqual({
      phase: 'start',
      count: 0,
      bitIndex: 0,
      shift: 0xff,
    });
  });

  it('should leave done after one step', () => {
    const done = { phase: 'done' as const, count: 0, bitIndex: 7, shift: 0x41 };
    expect(stepUartTx(done, undefined, 16).phase).toBe('idle');
  });
});

describe('UartTx', () => {
  it('should idle high with nothing to send', () => {
    const { clock, tx } = createTx();
    clock.advance(20);
    expect(tx.line).toBe(1);
    expect(tx.busy).toBe(false);
  });

  it('should shift out start, data LSB first and stop with exact bit periods', () => {
    const { clock, fifo, tx } = createTx(16);
    fifo.tryPush(0x4b);

    const levels: Bit[] = [];
    const doneTicks: number[] = [];
    for (let tick = 0; tick < 170; tick += 1) {
      clock.advance();
      levels.push(tx.line);
      if (tx.done) {
        doneTicks.push(tick);
      }
    }

    // levels[k] is the line after tick k; the byte is popped on tick 0
    expect(levels.slice(0, 16)).toEqual(new Array<Bit>(16).fill(0));
    const dataBits = [0, 1, 2, 3, 4, 5, 6, 7].map((i) => levels[16 + 16 * i + 8]);
    expect(dataBits).toEqual([1, 1, 0, 1, 0, 0, 1, 0]);
    expect(levels[15 + 16]).toBe(1);
    expect(levels.slice(144, 170)).toEqual(new Array<Bit>(26).fill(1));
    expect(doneTicks).toEqual([160]);
    expect(tx.getFramesSent()).toBe(1);
    expect(fifo.isEmpty()).toBe(true);
  });

  it('should be busy from the pop through the done step', () => {
    const { clock, fifo, tx } = createTx(4);
    fifo.tryPush(0x00);
    clock.advance();
    expect(tx.busy).toBe(true);
    expect(tx.phase).toBe('start');
    // 10 bits of 4 ticks, then done on tick 40
    clock.advance(40);
    expect(tx.phase).toBe('done');
    expect(tx.busy).toBe(true);
    clock.advance();
    expect(tx.busy).toBe(false);
  });

  it('should send queued bytes back to back', () => {
    const { clock, fifo, tx } = createTx(2);
    fifo.tryPush(0x01);
    fifo.tryPush(0x02);
    // 20 ticks per frame, the done tick, then a tick back in idle
    clock.advance(22);
    expect(tx.getFramesSent()).toBe(1);
    expect(fifo.length).toBe(1);
    clock.advance(1);
    expect(tx.phase).toBe('start');
    expect(fifo.isEmpty()).toBe(true);
    clock.advance(21);
    expect(tx.getFramesSent()).toBe(2);
  });

  it('should return to idle on reset', () => {
    const { clock, fifo, tx } = createTx();
    fifo.tryPush(0x55);
    clock.advance(30);
    clock.reset();
    expect(tx.phase).toBe('idle');
    expect(tx.line).toBe(1);
    expect(tx.getFramesSent()).toBe(0);
  });
});
