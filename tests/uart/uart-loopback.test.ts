/**
 * @file UART transmit-to-receive loopback tests
 */

import { describe, it, expect } from 'vitest';
import { TickSource } from '../../src/clock/tick-source';
import { ConfigurationError } from '../../src/errors';
import { Uart } from '../../src/uart/uart';

const UART_OPTIONS = { clockHz: 1_600_000, baud: 100_000, oversample: 16, fifoDepth: 16 };

function createLoopback(reverse = false): { clock: TickSource; uart: Uart } {
  const clock = new TickSource();
  const uart = new Uart(UART_OPTIONS);
  uart.connectRx(() => uart.txLine);
  const components = reverse ? [...uart.components].reverse() : uart.components;
  for (const component of components) {
    clock.register(component);
  }
  return { clock, uart };
}

describe('Uart loopback', () => {
  it('should deliver a byte to the receive FIFO after 156 ticks', () => {
    const { clock, uart } = createLoopback();
    expect(uart.submit(0x55)).toBe(true);
    clock.advance(1);
    expect(uart.txLine).toBe(0);
    clock.advance(154);
    expect(uart.rxFifo.isEmpty()).toBe(true);
    clock.advance(1);
    expect(uart.rxFifo.length).toBe(1);
    expect(uart.pollByte()).toEqual({ byte: 0x55, frameError: false });
    expect(uart.getCounters().framesSent).toBe(0);
    clock.advance(10);
    expect(uart.getCounters()).toEqual({
      framesReceived: 1,
      frameErrors: 0,
      overruns: 0,
      framesSent: 1,
    });
  });

  it('should deliver queued bytes in order', () => {
    const { clock, uart } = createLoopback();
    const bytes = [0x00, 0xff, 0x81, 0x3c];
    for (const byte of bytes) {
      uart.submit(byte);
    }
    clock.advance(1000);
    const received: number[] = [];
    for (let r = uart.pollByte(); r !== undefined; r = uart.pollByte()) {
      received.push(r.byte);
    }
    expect(received).toEqual(bytes);
  });

  it('should produce identical traces whatever the registration order', () => {
    const forward = createLoopback(false);
    const reverse = createLoopback(true);
    forward.uart.submit(0xc9);
    reverse.uart.submit(0xc9);
    const trace = (uart: Uart): string => `${uart.txLine}:${uart.rx.phase}:${uart.rxFifo.length}`;
    const forwardTrace: string[] = [];
    const reverseTrace: string[] = [];
    for (let i = 0; i < 400; i += 1) {
      forward.clock.advance();
      reverse.clock.advance();
      forwardTrace.push(trace(forward.uart));
      reverseTrace.push(trace(reverse.uart));
    }
    expect(reverseTrace).toEqual(forwardTrace);
    expect(forward.uart.pollByte()).toEqual({ byte: 0xc9, frameError: false });
  });

  it('should refuse bytes when the transmit FIFO is full', () => {
    const uart = new Uart({ ...UART_OPTIONS, fifoDepth: 2 });
    expect(uart.submit(1)).toBe(true);
    expect(uart.submit(2)).toBe(true);
    expect(uart.submit(3)).toBe(false);
    expect(uart.txFifo.toArray()).toEqual([1, 2]);
  });

  it('should reject a tick rate too low for the baud rate', () => {
    expect(() => new Uart({ ...UART_OPTIONS, clockHz: 1000, baud: 115_200 })).toThrow(
      'Invalid UART configuration: clockHz 1000 is too low for 115200 baud at 16x oversampling'
    );
  });

  it('should reject an odd oversampling factor', () => {
    let caught: unknown;
    try {
      new Uart({ ...UART_OPTIONS, oversample: 15 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ problems: ['uart.oversample must be even, got 15'] });
  });
});
