/**
 * @file log.ts
 * @description Leveled logger writing `LEVEL: message` lines to a Writer.
 */

import type { Writer } from './writer.js';
import { nullWriter } from './writer.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARNING]: 'WARNING',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

/**
 * Parse a level name ("debug", "info", "warning", "error").
 * @returns the level, or null if the name is not recognized
 */
export function parseLogLevel(nm: string): LogLevel | null {
  switch (nm.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn':
    case 'warning': return LogLevel.WARNING;
    case 'error': return LogLevel.ERROR;
    case 'silent': return LogLevel.SILENT;
    default: return null;
  }
}

export class Logger {
  private out: Writer;
  private threshold: LogLevel;

  constructor(out: Writer, threshold: LogLevel = LogLevel.INFO) {
    this.out = out;
    this.threshold = threshold;
  }

  /** Messages below the threshold are dropped */
  setThreshold(level: LogLevel): void {
    this.threshold = level;
  }

  log(level: LogLevel, message: string): void {
    if (level < this.threshold) return;
    this.out.write(`${LEVEL_NAMES[level]}: ${message}\n`);
  }

  debug(message: string): void { this.log(LogLevel.DEBUG, message); }
  info(message: string): void { this.log(LogLevel.INFO, message); }
  warning(message: string): void { this.log(LogLevel.WARNING, message); }
  error(message: string): void { this.log(LogLevel.ERROR, message); }
}

/** Logger that drops everything; the default for library callers */
export const silentLogger = new Logger(nullWriter, LogLevel.SILENT);
