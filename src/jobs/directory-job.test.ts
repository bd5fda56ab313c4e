import { describe, it, expect, vi } from 'vitest';
import * as path from 'path';
import { directoryOutputFile, parsePoint } from './directory-job.js';
import { config } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('parsePoint', () => {
  it('should parse a lat,lng pair', () => {
    expect(parsePoint('29.3838,-94.9027')).toEqual({ latitude: 29.3838, longitude: -94.9027 });
    expect(parsePoint(' 30 , -97.5 ')).toEqual({ latitude: 30, longitude: -97.5 });
  });

  it('should reject malformed or out-of-range points', () => {
    for (const point of ['', 'texas', '29.3', '1,2,3', '95,0', '0,181', '29.3,']) {
      expect(() => parsePoint(point)).toThrow(ConfigError);
    }
  });
});

describe('directoryOutputFile', () => {
  it('should name the file after the strategy', () => {
    expect(directoryOutputFile('capture')).toBe(path.join(config.output.dir, 'directory_results_capture.csv'));
  });
});
