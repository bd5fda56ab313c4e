/**
 * Structured console logger.
 * Usage: logger.info('Listing collected', { name, attempt })
 */

import { LogLevel } from '../types/index.js';
import { config } from './config.js';

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly format: 'text' | 'json'
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log('error', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta && Object.keys(meta).length > 0 ? { meta } : {}),
    };

    const line = this.formatEntry(entry);
    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private formatEntry(entry: LogEntry): string {
    if (this.format === 'json') {
      return JSON.stringify(entry);
    }

    let line = `[${entry.timestamp}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
    if (entry.meta) {
      line += ` ${JSON.stringify(entry.meta)}`;
    }
    return line;
  }
}

export const logger = new Logger(config.app.logLevel, config.app.logFormat);
