/**
 * Structured logger with file and console output support
 */

import * as fs from 'fs';
import { colors, stripColors } from '../config/colors';
import { LogLevel } from '../types';

export interface LoggerOptions {
  logFile?: string | null;
  verbose?: boolean;
}

/**
 * Logger writing to the console, and appending to a log file when one is given
 */
export class Logger {
  private logStream: fs.WriteStream | null = null;
  private verbose: boolean;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;

    if (options.logFile) {
      const logFile = options.logFile;
      const stream = fs.createWriteStream(logFile, { flags: 'a' });
      // An unwritable log file falls back to console-only logging
      stream.on('error', (error) => {
        console.error(`${colors.red}[ERROR]${colors.reset}`, `Cannot write log file ${logFile}: ${error.message}`);
        if (this.logStream === stream) {
          this.logStream = null;
        }
      });
      this.logStream = stream;
    }
  }

  /**
   * Format arguments to a single line
   */
  private formatArgs(args: unknown[]): string {
    return args
      .map((arg) => {
        if (typeof arg === 'string') {
          // Strip ANSI colors for file logging
          return stripColors(arg);
        }
        if (arg instanceof Error) {
          return `${arg.name}: ${arg.message}`;
        }
        if (typeof arg === 'bigint') {
          return arg.toString();
        }
        if (typeof arg === 'object') {
          return JSON.stringify(arg, (_key, value: unknown) =>
            typeof value === 'bigint' ? value.toString() : value
          );
        }
        return String(arg);
      })
      .join(' ');
  }

  private writeToFile(level: LogLevel, args: unknown[]): void {
    this.logStream?.write(`${new Date().toISOString()} [${level}] ${this.formatArgs(args)}\n`);
  }

  /**
   * Debug level logging (only when verbose)
   */
  debug(...args: unknown[]): void {
    if (!this.verbose) {
      return;
    }
    console.log(`${colors.gray}[DEBUG]${colors.reset}`, ...args);
    this.writeToFile(LogLevel.DEBUG, args);
  }

  /**
   * Info level logging
   */
  info(...args: unknown[]): void {
    console.log(...args);
    this.writeToFile(LogLevel.INFO, args);
  }

  /**
   * Warning level logging
   */
  warn(...args: unknown[]): void {
    console.warn(`${colors.yellow}[WARN]${colors.reset}`, ...args);
    this.writeToFile(LogLevel.WARN, args);
  }

  /**
   * Error level logging
   */
  error(...args: unknown[]): void {
    console.error(`${colors.red}[ERROR]${colors.reset}`, ...args);
    this.writeToFile(LogLevel.ERROR, args);
  }

  /**
   * Close the log stream, resolving once the file is flushed and closed
   */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      stream.once('close', () => resolve());
      stream.end();
    });
  }
}

/**
 * Global logger instance (initialized by main app)
 */
let globalLogger: Logger | null = null;

/**
 * Initialize the global logger
 */
export async function initLogger(options: LoggerOptions): Promise<Logger> {
  if (globalLogger) {
    await globalLogger.close();
  }
  globalLogger = new Logger(options);
  return globalLogger;
}

/**
 * Get the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
