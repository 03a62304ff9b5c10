/**
 * @file Validation of serial engine configuration.
 * @description Field validators collect every problem with a readable message;
 * `normalizeSerialConfig` merges defaults and throws a ConfigurationError when
 * anything is wrong.
 * @module config/config-validation
 */

import { effectiveBaud, sampleDivisor } from '../clock/clock-divider';
import { ConfigurationError } from '../errors';
import { LOG_LEVELS, isLogLevel } from '../logging';
import {
  DEFAULT_SERIAL_CONFIG,
  type SerialConfig,
  type SerialConfigInput,
  type SpiConfig,
  type UartConfig,
} from './types';

// ============================================================================
// Constants
// ============================================================================

/** Widest SPI transfer the engine supports */
export const SPI_WIDTH_MAX = 32;

/**
 * Smallest SPI half period, in ticks. MISO reaches the master through a
 * two-stage synchronizer one tick after the peripheral drives it, so a
 * shorter half period samples the previous bit.
 */
export const SPI_CLOCK_DIVISOR_MIN = 4;

/** Largest FIFO capacity accepted from configuration */
export const FIFO_DEPTH_MAX = 65536;

/** Baud error beyond which a warning is reported (fraction of requested rate) */
export const BAUD_ERROR_WARN = 0.02;

// ============================================================================
// Validation Result Types
// ============================================================================

/**
 * Validation result containing all issues found.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;
  /** List of error messages */
  errors: string[];
  /** List of warning messages */
  warnings: string[];
}

function ok(): ValidationResult {
  return { valid: true, errors: [], warnings: [] };
}

/**
 * Combines several validation results into one.
 */
export function mergeResults(...results: ValidationResult[]): ValidationResult {
  const errors = results.flatMap((result) => result.errors);
  const warnings = results.flatMap((result) => result.warnings);
  return { valid: errors.length === 0, errors, warnings };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Individual Validators
// ============================================================================

/**
 * Validates an optional integer field against an inclusive range.
 * @param value - Value to validate
 * @param fieldName - Name of the field for error messages
 * @returns Validation result
 */
export function validateInteger(
  value: unknown,
  fieldName: string,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined) {
    return { valid: true, errors, warnings };
  }

  if (typeof value !== 'number') {
    errors.push(`${fieldName} must be a number, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  if (!Number.isInteger(value)) {
    errors.push(`${fieldName} must be an integer, got ${value}`);
    return { valid: false, errors, warnings };
  }

  if (value < min || value > max) {
    errors.push(`${fieldName} must be between ${min} and ${max}, got ${value}`);
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

/**
 * Validates an optional 0/1 field (CPOL, CPHA).
 */
export function validateBit(value: unknown, fieldName: string): ValidationResult {
  if (value === undefined || value === 0 || value === 1) {
    return ok();
  }
  return {
    valid: false,
    errors: [`${fieldName} must be 0 or 1, got ${String(value)}`],
    warnings: [],
  };
}

/**
 * Validates the logging level name.
 */
export function validateLogLevel(value: unknown): ValidationResult {
  if (value === undefined || isLogLevel(value)) {
    return ok();
  }
  return {
    valid: false,
    errors: [`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${String(value)}`],
    warnings: [],
  };
}

/**
 * Validates SPI master settings. Missing fields are allowed.
 * @param raw - SPI section of a configuration
 * @returns Validation result
 */
export function validateSpiConfig(raw: unknown): ValidationResult {
  if (raw === undefined) {
    return ok();
  }
  if (!isRecord(raw)) {
    return { valid: false, errors: ['spi must be an object'], warnings: [] };
  }
  return mergeResults(
    validateInteger(raw.width, 'spi.width', 1, SPI_WIDTH_MAX),
    validateBit(raw.cpol, 'spi.cpol'),
    validateBit(raw.cpha, 'spi.cpha'),
    validateInteger(raw.clockDivisor, 'spi.clockDivisor', SPI_CLOCK_DIVISOR_MIN)
  );
}

/**
 * Validates UART field types and ranges. Missing fields are allowed.
 * @param raw - UART section of a configuration
 * @returns Validation result
 */
export function validateUartConfig(raw: unknown): ValidationResult {
  if (raw === undefined) {
    return ok();
  }
  if (!isRecord(raw)) {
    return { valid: false, errors: ['uart must be an object'], warnings: [] };
  }
  const ovr = raw.oversample;
  const oversample = validateInteger(ovr, 'uart.oversample', 2);
  if (oversample.valid && typeof ovr === 'number' && ovr % 2 !== 0) {
    oversample.valid = false;
    oversample.errors.push(`uart.oversample must be even, got ${ovr}`);
  }
  return mergeResults(
    validateInteger(raw.baud, 'uart.baud', 1),
    oversample,
    validateInteger(raw.fifoDepth, 'uart.fifoDepth', 1, FIFO_DEPTH_MAX)
  );
}

/**
 * Checks that the tick rate can produce the requested baud rate.
 * @returns Errors when no integer divisor exists, warnings when the rate is off by more than 2%
 */
export function validateUartTiming(clockHz: number, uart: UartConfig): ValidationResult {
  const divisor = sampleDivisor(clockHz, uart.baud, uart.oversample);
  if (divisor < 1) {
    return {
      valid: false,
      errors: [
        `clockHz ${clockHz} is too low for ${uart.baud} baud at ${uart.oversample}x oversampling`,
      ],
      warnings: [],
    };
  }
  const actual = effectiveBaud(clockHz, divisor, uart.oversample);
  const error = Math.abs(actual - uart.baud) / uart.baud;
  const warnings: string[] = [];
  if (error > BAUD_ERROR_WARN) {
    warnings.push(
      `uart.baud ${uart.baud} is produced as ${actual.toFixed(1)} (${(error * 100).toFixed(1)}% error)`
    );
  }
  return { valid: true, errors: [], warnings };
}

// ============================================================================
// Whole-configuration Validation
// ============================================================================

/**
 * Validates a raw configuration object (for example parsed JSON).
 * @param raw - Configuration to validate
 * @returns Every error and warning found
 */
export function validateSerialConfig(raw: unknown): ValidationResult {
  if (!isRecord(raw)) {
    return { valid: false, errors: ['configuration must be an object'], warnings: [] };
  }
  const shape = mergeResults(
    validateInteger(raw.clockHz, 'clockHz', 1),
    validateUartConfig(raw.uart),
    validateSpiConfig(raw.spi),
    validateLogLevel(raw.logLevel)
  );
  if (!shape.valid) {
    return shape;
  }
  const { clockHz, uart: uartRaw } = raw;
  const uartFields: Record<string, unknown> = isRecord(uartRaw) ? uartRaw : {};
  const { baud, oversample } = uartFields;
  const defaults = DEFAULT_SERIAL_CONFIG;
  const timing = validateUartTiming(typeof clockHz === 'number' ? clockHz : defaults.clockHz, {
    baud: typeof baud === 'number' ? baud : defaults.uart.baud,
    oversample: typeof oversample === 'number' ? oversample : defaults.uart.oversample,
    fifoDepth: defaults.uart.fifoDepth,
  });
  return mergeResults(shape, timing);
}

/**
 * Merges a partial configuration over the defaults and validates the result.
 * @throws ConfigurationError listing every problem
 */
export function normalizeSerialConfig(input: SerialConfigInput = {}): SerialConfig {
  const result = validateSerialConfig(input);
  if (!result.valid) {
    throw ConfigurationError.fromProblems('serial system', result.errors);
  }
  return {
    clockHz: input.clockHz ?? DEFAULT_SERIAL_CONFIG.clockHz,
    uart: { ...DEFAULT_SERIAL_CONFIG.uart, ...input.uart },
    spi: { ...DEFAULT_SERIAL_CONFIG.spi, ...input.spi },
    logLevel: input.logLevel ?? DEFAULT_SERIAL_CONFIG.logLevel,
  };
}

/**
 * Validates a complete SPI configuration for an engine.
 * @throws ConfigurationError when invalid
 */
export function assertSpiConfig(config: SpiConfig): void {
  const result = validateSpiConfig(config);
  if (!result.valid) {
    throw ConfigurationError.fromProblems('SPI master', result.errors);
  }
}

/**
 * Validates UART settings for an engine.
 * @throws ConfigurationError when invalid
 */
export function assertUartConfig(clockHz: number, uart: UartConfig): void {
  const shape = mergeResults(
    validateInteger(clockHz, 'clockHz', 1),
    validateUartConfig(uart)
  );
  if (!shape.valid) {
    throw ConfigurationError.fromProblems('UART', shape.errors);
  }
  const timing = validateUartTiming(clockHz, uart);
  if (!timing.valid) {
    throw ConfigurationError.fromProblems('UART', timing.errors);
  }
}
