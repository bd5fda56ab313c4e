import { config as dotenvConfig } from 'dotenv';
import { Config, LogLevel } from '../types/index.js';
import { ConfigError } from './errors.js';

dotenvConfig();

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/124.0.0.0 Safari/537.36';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function getEnvVar(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Parse a non-negative integer setting; empty input falls back to the default
 */
export function parseInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find(l => l === raw?.toLowerCase());
  return level ?? 'info';
}

export const config: Config = {
  browser: {
    headless: parseBoolean(getEnvVar('HEADLESS'), true),
    executablePath: getEnvVar('CHROME_EXECUTABLE_PATH'),
    wsEndpoint: getEnvVar('BROWSER_WS_ENDPOINT'),
    userAgent: getEnvVar('USER_AGENT') || DEFAULT_USER_AGENT,
  },
  scrape: {
    maxResults: parseInteger('MAX_RESULTS', getEnvVar('MAX_RESULTS'), 50),
    retryLimit: parseInteger('RETRY_LIMIT', getEnvVar('RETRY_LIMIT'), 3),
    retryDelayMs: parseInteger('RETRY_DELAY_MS', getEnvVar('RETRY_DELAY_MS'), 1500),
    waitTimeoutMs: parseInteger('WAIT_TIMEOUT_MS', getEnvVar('WAIT_TIMEOUT_MS'), 30000),
    scrollPauseMs: parseInteger('SCROLL_PAUSE_MS', getEnvVar('SCROLL_PAUSE_MS'), 1250),
    maxScrolls: parseInteger('MAX_SCROLLS', getEnvVar('MAX_SCROLLS'), 50),
    httpTimeoutMs: parseInteger('HTTP_TIMEOUT_MS', getEnvVar('HTTP_TIMEOUT_MS'), 30000),
  },
  output: {
    dir: getEnvVar('OUTPUT_DIR') || './output',
  },
  selectorsFile: getEnvVar('SELECTORS_FILE'),
  app: {
    logLevel: parseLogLevel(getEnvVar('LOG_LEVEL')),
    logFormat: getEnvVar('LOG_FORMAT') === 'json' ? 'json' : 'text',
  },
};
