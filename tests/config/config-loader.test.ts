import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfigFile,
  loadSerialConfig,
} from '../../src/config/config-loader';
import { ConfigFileError, ConfigurationError } from '../../src/errors';
import { SerialSystem } from '../../src/system/serial-system';

const withTempDir = (fn: (dir: string) => void): void => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'serialsim-config-'));
  try {
    fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
};

const writeJson = (file: string, value: unknown): void => {
  fs.writeFileSync(file, JSON.stringify(value, null, 2));
};

describe('config-loader', () => {
  describe('findConfigFile', () => {
    it('finds the config file in a parent directory', () => {
      withTempDir((dir) => {
        const nested = path.join(dir, 'a', 'b');
        fs.mkdirSync(nested, { recursive: true });
        writeJson(path.join(dir, CONFIG_FILE_NAME), { clockHz: 1_600_000 });
        expect(findConfigFile(nested)).toBe(path.join(dir, CONFIG_FILE_NAME));
      });
    });

    it('prefers the nearest directory', () => {
      withTempDir((dir) => {
        const nested = path.join(dir, 'inner');
        fs.mkdirSync(nested);
        writeJson(path.join(dir, CONFIG_FILE_NAME), {});
        writeJson(path.join(nested, CONFIG_FILE_NAME), {});
        expect(findConfigFile(nested)).toBe(path.join(nested, CONFIG_FILE_NAME));
      });
    });

    it('finds a package.json with a serialsim section', () => {
      withTempDir((dir) => {
        writeJson(path.join(dir, 'package.json'), { name: 'bench', serialsim: { logLevel: 'warn' } });
        expect(findConfigFile(dir)).toBe(path.join(dir, 'package.json'));
      });
    });

    it('skips a malformed package.json on the way up', () => {
      withTempDir((dir) => {
        const mid = path.join(dir, 'mid');
        const leaf = path.join(mid, 'leaf');
        fs.mkdirSync(leaf, { recursive: true });
        writeJson(path.join(dir, CONFIG_FILE_NAME), {});
        fs.writeFileSync(path.join(mid, 'package.json'), '{ not json');
        expect(findConfigFile(leaf)).toBe(path.join(dir, CONFIG_FILE_NAME));
        expect(() => loadConfigFile(path.join(mid, 'package.json'))).toThrow(ConfigFileError);
      });
    });

    it('accepts custom candidate names', () => {
      withTempDir((dir) => {
        writeJson(path.join(dir, 'bench.json'), {});
        expect(findConfigFile(dir, ['bench.json'])).toBe(path.join(dir, 'bench.json'));
      });
    });
  });

  describe('loadConfigFile', () => {
    it('reads the serialsim section of package.json', () => {
      withTempDir((dir) => {
        const pkg = path.join(dir, 'package.json');
        writeJson(pkg, { name: 'bench', serialsim: { spi: { width: 16 } } });
        expect(loadConfigFile(pkg)).toEqual({ spi: { width: 16 } });
      });
    });

    it('throws ConfigFileError for malformed JSON', () => {
      withTempDir((dir) => {
        const file = path.join(dir, CONFIG_FILE_NAME);
        fs.writeFileSync(file, '{ "clockHz": ');
        expect(() => loadConfigFile(file)).toThrow(ConfigFileError);
        expect(() => loadConfigFile(file)).toThrow(`Cannot parse ${file}`);
      });
    });

    it('throws ConfigFileError for a missing file', () => {
      withTempDir((dir) => {
        const file = path.join(dir, 'missing.json');
        let caught: unknown;
        try {
          loadConfigFile(file);
        } catch (err) {
          caught = err;
        }
        expect(caught).toBeInstanceOf(ConfigFileError);
        expect(caught).toMatchObject({ code: 'CONFIG_FILE_ERROR', filePath: file });
      });
    });
  });

  describe('loadSerialConfig', () => {
    it('merges the file over the defaults and overrides over the file', () => {
      withTempDir((dir) => {
        writeJson(path.join(dir, CONFIG_FILE_NAME), {
          clockHz: 1_600_000,
          uart: { baud: 100_000, fifoDepth: 4 },
          spi: { cpol: 1, cpha: 1 },
          logLevel: 'info',
        });
        const config = loadSerialConfig(dir, { spi: { clockDivisor: 8 } });
        expect(config).toEqual({
          clockHz: 1_600_000,
          uart: { baud: 100_000, oversample: 16, fifoDepth: 4 },
          spi: { width: 8, cpol: 1, cpha: 1, clockDivisor: 8 },
          logLevel: 'info',
        });
      });
    });

    it('reports every problem in the file', () => {
      withTempDir((dir) => {
        const file = path.join(dir, CONFIG_FILE_NAME);
        writeJson(file, { uart: { oversample: 7 }, spi: { width: 64 } });
        let caught: unknown;
        try {
          loadSerialConfig(dir);
        } catch (err) {
          caught = err;
        }
        expect(caught).toBeInstanceOf(ConfigurationError);
        expect(caught).toMatchObject({
          problems: ['uart.oversample must be even, got 7', 'spi.width must be between 1 and 32, got 64'],
        });
      });
    });

    it('rejects a file that is not an object', () => {
      withTempDir((dir) => {
        const file = path.join(dir, CONFIG_FILE_NAME);
        writeJson(file, [1, 2]);
        expect(() => loadSerialConfig(dir)).toThrow(
          `Invalid configuration in ${file}: configuration must be an object`
        );
      });
    });

    it('builds a system from the file', () => {
      withTempDir((dir) => {
        writeJson(path.join(dir, CONFIG_FILE_NAME), {
          clockHz: 1_600_000,
          uart: { baud: 100_000 },
        });
        const system = SerialSystem.fromConfigFile(dir, { overrides: { spi: { width: 12 } } });
        expect(system.uart.sampleDivisor).toBe(1);
        expect(system.spi.width).toBe(12);
      });
    });
  });
});
