/**
 * Logger module for tracking every stage of a ranking run
 * Logs to the console and, once configured, to a timestamped file
 */

import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SUCCESS = 'SUCCESS'
}

// SUCCESS is reported at INFO priority
const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.SUCCESS]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40
};

export interface LoggerOptions {
  level?: LogLevel;
  logDirectory?: string;
  toFile?: boolean;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const upper = value?.trim().toUpperCase();
  const match = Object.values(LogLevel).find(level => level === upper);
  return match ?? fallback;
}

export class Logger {
  private level: LogLevel;
  private logFilePath: string | null = null;
  private logStream: fs.WriteStream | null = null;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    if (options.toFile) {
      this.openFile(options.logDirectory ?? './logs');
    }
  }

  /**
   * Apply level and file settings loaded from configuration
   */
  configure(options: LoggerOptions): void {
    if (options.level) {
      this.level = options.level;
    }
    if (options.toFile && !this.logStream) {
      this.openFile(options.logDirectory ?? './logs');
    }
    if (options.toFile === false && this.logStream) {
      this.logStream.end();
      this.logStream = null;
      this.logFilePath = null;
    }
  }

  private openFile(logDirectory: string): void {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true });
    }

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFilePath = path.join(logDirectory, `ranking-${timestamp}.log`);
    this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });

    this.info(`Logger initialized. Log file: ${this.logFilePath}`);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.enabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const consoleMessage = `[${level}] ${message}`;

    if (this.logStream) {
      this.logStream.write(`[${timestamp}] ${consoleMessage}\n`);
      if (data !== undefined) {
        this.logStream.write(`  Data: ${this.stringify(data)}\n`);
      }
    }

    const write = level === LogLevel.ERROR ? console.error : level === LogLevel.WARN ? console.warn : console.log;
    if (data !== undefined) {
      write(consoleMessage, data);
    } else {
      write(consoleMessage);
    }
  }

  private stringify(data: unknown): string {
    if (data instanceof Error) {
      return data.stack ?? data.message;
    }
    return typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data);
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown): void {
    this.log(LogLevel.ERROR, message, error);
  }

  success(message: string, data?: unknown): void {
    this.log(LogLevel.SUCCESS, message, data);
  }

  /**
   * Log separator line for readability
   */
  separator(char: string = '=', length: number = 80): void {
    if (!this.enabled(LogLevel.INFO)) {
      return;
    }
    const line = char.repeat(length);
    this.logStream?.write(line + '\n');
    console.log(line);
  }

  /**
   * Log section header
   */
  section(title: string): void {
    this.separator('=');
    this.info(title);
    this.separator('=');
  }

  close(): void {
    this.info('Logger closing');
    this.logStream?.end();
    this.logStream = null;
  }

  getLogFilePath(): string | null {
    return this.logFilePath;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

const isTest = process.env.NODE_ENV === 'test';

export const logger = new Logger({
  level: parseLogLevel(process.env.LOG_LEVEL, isTest ? LogLevel.ERROR : LogLevel.INFO)
});
