// Clocking
export { TickSource, type TickCallback } from './clock/tick-source';
export { stepDivider, sampleDivisor, effectiveBaud, type DividerStep } from './clock/clock-divider';
export { Line, toBit, type Bit, type Clocked, type LineSource } from './clock/types';

// Primitives
export { Synchronizer } from './hw/synchronizer';
export { Fifo, type FifoTransaction } from './hw/fifo';

// UART
export { Uart, type UartOptions, type UartReceived, type UartCounters } from './uart/uart';
export {
  UartRx,
  stepUartRx,
  initialUartRxState,
  type UartRxPhase,
  type UartRxState,
  type UartRxEffects,
} from './uart/uart-rx';
export {
  UartTx,
  stepUartTx,
  uartTxLine,
  initialUartTxState,
  type UartTxPhase,
  type UartTxState,
} from './uart/uart-tx';

// SPI
export {
  SpiMaster,
  stepSpiMaster,
  initialSpiMasterState,
  widthMask,
  type SpiPhase,
  type SpiLines,
  type SpiMasterState,
  type SpiMasterOptions,
  type SpiStartRequest,
} from './spi/spi-master';

// Dispatcher
export {
  Dispatcher,
  type DispatcherPhase,
  type ByteSource,
  type ByteSink,
  type SpiPort,
} from './dispatch/dispatcher';
export * from './dispatch/commands';

// System
export { SerialSystem, type SerialSystemOptions, type SerialCounters } from './system/serial-system';
export * from './system/status';

// Configuration, errors, logging
export * from './config/types';
export {
  validateSerialConfig,
  validateSpiConfig,
  validateUartConfig,
  validateUartTiming,
  normalizeSerialConfig,
  SPI_CLOCK_DIVISOR_MIN,
  SPI_WIDTH_MAX,
  type ValidationResult,
} from './config/config-validation';
export { findConfigFile, loadConfigFile, loadSerialConfig } from './config/config-loader';
export * from './errors';
export { createLogger, type Logger, type LogLevel } from './logging';
