/**
 * BLE Logger
 * Logs scale bridge operations to the console and, optionally, to a file
 * for debugging connection issues on headless hosts
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  logDir?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class BleLogger {
  private level: LogLevel;
  private logFilePath = '';
  private logStream: fs.WriteStream | null = null;

  constructor(options: LoggerOptions = {}) {
    const envLevel = process.env.SCALE_LOG_LEVEL;
    this.level = options.level ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info');

    if (options.logDir) {
      this.openFile(options.logDir);
    }
  }

  /**
   * Apply runtime options. A new logDir closes the previous file.
   */
  configure(options: LoggerOptions): void {
    if (options.level) {
      this.level = options.level;
    }
    if (options.logDir && path.resolve(options.logDir) !== path.dirname(this.logFilePath)) {
      void this.close();
      this.openFile(options.logDir);
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private openFile(logDir: string): void {
    try {
      const dir = path.resolve(logDir);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.logFilePath = path.join(dir, `scale-bridge-${timestamp}.log`);
      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.logStream.on('error', error => {
        console.warn('BleLogger: File logging stopped -', error.message);
        this.logStream = null;
      });
      this.info(`Log file: ${this.logFilePath}`, undefined, 'LOGGER');
    } catch (error) {
      // Continue with console output only
      console.warn('BleLogger: File logging disabled -', error instanceof Error ? error.message : String(error));
      this.logFilePath = '';
      this.logStream = null;
    }
  }

  private formatMessage(level: LogLevel, category: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level.toUpperCase()}] [${category}] ${message}`;

    if (data !== undefined) {
      try {
        logLine += ` | ${JSON.stringify(data)}`;
      } catch {
        logLine += ' | [Unserializable data]';
      }
    }

    return logLine;
  }

  log(level: LogLevel, message: string, data?: unknown, category: string = 'BLE'): void {
    if (!this.isEnabled(level)) return;

    const formattedMessage = this.formatMessage(level, category, message, data);

    if (level === 'error') {
      console.error(formattedMessage);
    } else if (level === 'warn') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }

    if (this.logStream) {
      this.logStream.write(formattedMessage + '\n');
    }
  }

  trace(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('trace', message, data, category);
  }

  debug(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('debug', message, data, category);
  }

  info(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('info', message, data, category);
  }

  warn(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('warn', message, data, category);
  }

  error(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('error', message, data, category);
  }

  // Connection-specific logging
  logConnection(address: string, deviceName: string, phase: string, details?: unknown): void {
    this.info(`${phase} - ${deviceName} (${address})`, details, 'CONNECTION');
  }

  logConnectionError(address: string, deviceName: string, phase: string, error: unknown): void {
    this.warn(`${phase} FAILED - ${deviceName} (${address})`, describeError(error), 'CONNECTION');
  }

  // Resolves once buffered lines reached the file
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    this.logFilePath = '';
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise(resolve => stream.end(() => resolve()));
  }

  getLogPath(): string {
    return this.logFilePath;
  }
}

export function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Singleton instance
export const bleLogger = new BleLogger();
