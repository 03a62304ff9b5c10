/**
 * @fileoverview Configuration file discovery and loading.
 * Looks for serialsim.json, or a "serialsim" section in package.json, walking
 * up from a starting directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigFileError, ConfigurationError, getErrorMessage } from '../errors';
import { isRecord, normalizeSerialConfig, validateSerialConfig } from './config-validation';
import { isLogLevel } from '../logging';
import type { SerialConfig, SerialConfigInput, SpiConfig, UartConfig } from './types';

/** Default configuration file name */
export const CONFIG_FILE_NAME = 'serialsim.json';

/** Key of the configuration section inside package.json */
export const PACKAGE_JSON_KEY = 'serialsim';

/**
 * Searches for a configuration file starting from startDir and walking up
 * the directory tree.
 *
 * @param startDir - Directory to start searching from
 * @param configCandidates - List of config file names to look for
 * @returns The absolute path to the config file, or undefined if not found
 */
export function findConfigFile(
  startDir: string,
  configCandidates: string[] = [CONFIG_FILE_NAME]
): string | undefined {
  const dirsToCheck: string[] = [];
  for (let dir = path.resolve(startDir); ; ) {
    dirsToCheck.push(dir);
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  for (const dir of dirsToCheck) {
    for (const candidate of configCandidates) {
      const full = path.isAbsolute(candidate) ? candidate : path.join(dir, candidate);
      if (fs.existsSync(full)) {
        return full;
      }
    }

    const pkgPath = path.join(dir, 'package.json');
    if (fs.existsSync(pkgPath)) {
      try {
        if (readPackageSection(pkgPath) !== undefined) {
          return pkgPath;
        }
      } catch {
        /* ignore unreadable package.json files while searching */
      }
    }
  }

  return undefined;
}

/**
 * Loads raw configuration from a file path.
 *
 * @param configPath - Path to the configuration file
 * @returns The parsed, not yet validated, configuration object
 * @throws ConfigFileError if the file cannot be read or parsed
 */
export function loadConfigFile(configPath: string): unknown {
  if (path.basename(configPath) === 'package.json') {
    return readPackageSection(configPath) ?? {};
  }
  return readJson(configPath);
}

/**
 * Loads, validates and normalises the configuration found from startDir.
 * Falls back to defaults (merged with overrides) when no file exists.
 *
 * @param startDir - Directory to start searching from
 * @param overrides - Values that win over the file's
 * @throws ConfigFileError or ConfigurationError
 */
export function loadSerialConfig(
  startDir: string,
  overrides: SerialConfigInput = {}
): SerialConfig {
  const configPath = findConfigFile(startDir);
  const raw = configPath === undefined ? {} : loadConfigFile(configPath);
  const result = validateSerialConfig(raw);
  if (!result.valid || !isRecord(raw)) {
    throw new ConfigurationError(
      `Invalid configuration in ${configPath ?? 'defaults'}: ${result.errors.join('; ')}`,
      result.errors,
      { configPath }
    );
  }
  return normalizeSerialConfig(mergeInput(raw, overrides));
}

function readJson(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigFileError(`Cannot read ${filePath}: ${getErrorMessage(err)}`, filePath, err);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new ConfigFileError(`Cannot parse ${filePath}: ${getErrorMessage(err)}`, filePath, err);
  }
}

function readPackageSection(pkgPath: string): unknown {
  const pkg = readJson(pkgPath);
  return isRecord(pkg) ? pkg[PACKAGE_JSON_KEY] : undefined;
}

/**
 * Overlays caller overrides on a validated raw configuration.
 */
function mergeInput(raw: Record<string, unknown>, overrides: SerialConfigInput): SerialConfigInput {
  const base = toInput(raw);
  return {
    ...base,
    ...overrides,
    uart: { ...base.uart, ...overrides.uart },
    spi: { ...base.spi, ...overrides.spi },
  };
}

/**
 * Narrows a validated record to the typed input shape.
 */
function toInput(raw: Record<string, unknown>): SerialConfigInput {
  const input: SerialConfigInput = {};
  const clockHz = raw.clockHz;
  if (typeof clockHz === 'number') {
    input.clockHz = clockHz;
  }
  const uartRaw = raw.uart;
  if (isRecord(uartRaw)) {
    const { baud, oversample, fifoDepth } = uartRaw;
    const uart: Partial<UartConfig> = {};
    if (typeof baud === 'number') uart.baud = baud;
    if (typeof oversample === 'number') uart.oversample = oversample;
    if (typeof fifoDepth === 'number') uart.fifoDepth = fifoDepth;
    input.uart = uart;
  }
  const spiRaw = raw.spi;
  if (isRecord(spiRaw)) {
    const { width, clockDivisor, cpol, cpha } = spiRaw;
    const spi: Partial<SpiConfig> = {};
    if (typeof width === 'number') spi.width = width;
    if (typeof clockDivisor === 'number') spi.clockDivisor = clockDivisor;
    if (cpol === 0 || cpol === 1) spi.cpol = cpol;
    if (cpha === 0 || cpha === 1) spi.cpha = cpha;
    input.spi = spi;
  }
  const logLevel = raw.logLevel;
  if (isLogLevel(logLevel)) {
    input.logLevel = logLevel;
  }
  return input;
}
