import { describe, it, expect } from 'vitest';
import { parseBoolean, parseInteger } from './config.js';
import { ConfigError } from './errors.js';

describe('parseInteger', () => {
  it('should fall back on missing or blank input', () => {
    expect(parseInteger('MAX_RESULTS', undefined, 50)).toBe(50);
    expect(parseInteger('MAX_RESULTS', '  ', 50)).toBe(50);
  });

  it('should parse a non-negative integer', () => {
    expect(parseInteger('MAX_RESULTS', ' 12 ', 50)).toBe(12);
    expect(parseInteger('RETRY_DELAY_MS', '0', 1500)).toBe(0);
  });

  it('should reject negatives, fractions and text', () => {
    expect(() => parseInteger('MAX_RESULTS', '-1', 50)).toThrow(ConfigError);
    expect(() => parseInteger('MAX_RESULTS', '2.5', 50)).toThrow(ConfigError);
    expect(() => parseInteger('MAX_RESULTS', 'many', 50)).toThrow('MAX_RESULTS must be a non-negative integer, got "many"');
  });
});

describe('parseBoolean', () => {
  it('should accept the usual truthy spellings', () => {
    for (const raw of ['1', 'true', 'YES', 'on']) {
      expect(parseBoolean(raw, false)).toBe(true);
    }
  });

  it('should treat anything else as false', () => {
    expect(parseBoolean('no', true)).toBe(false);
    expect(parseBoolean('0', true)).toBe(false);
  });

  it('should fall back on missing input', () => {
    expect(parseBoolean(undefined, true)).toBe(true);
    expect(parseBoolean('', false)).toBe(false);
  });
});
