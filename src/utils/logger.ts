import * as fs from 'fs';
import * as path from 'path';

import { config, LogLevel } from '../config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  colorize?: boolean;
  toFile?: boolean;
  directory?: string;
}

export class Logger {
  private readonly context: string;
  private readonly level: LogLevel;
  private readonly colorize: boolean;
  private readonly toFile: boolean;
  private readonly logDir: string;
  private logDirReady = false;

  constructor(context: string, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? config.logging.level;
    this.colorize = options.colorize ?? config.logging.colorize;
    this.toFile = options.toFile ?? config.logging.toFile;
    this.logDir = options.directory ?? config.logging.directory;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private getLogFileName(isError = false): string {
    const date = new Date().toISOString().split('T')[0];
    return path.join(this.logDir, `self-feedback${isError ? '-error' : ''}-${date}.log`);
  }

  private async writeToFile(entry: LogEntry): Promise<void> {
    const isError = entry.level === 'error';
    const logLine = JSON.stringify(entry) + '\n';

    try {
      if (!this.logDirReady) {
        await fs.promises.mkdir(this.logDir, { recursive: true });
        this.logDirReady = true;
      }
      await fs.promises.appendFile(this.getLogFileName(isError), logLine);
      // Also write errors to main log file
      if (isError) {
        await fs.promises.appendFile(this.getLogFileName(false), logLine);
      }
    } catch (err) {
      // Fallback to stderr if file write fails
      const errorMsg = {
        timestamp: new Date().toISOString(),
        level: 'error',
        service: 'Logger',
        message: 'Failed to write log to file',
        error: err instanceof Error ? { message: err.message, stack: err.stack } : { message: String(err) }
      };
      process.stderr.write(JSON.stringify(errorMsg) + '\n');
    }
  }

  private formatForDev(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toLocaleTimeString();
    const levelTag = {
      debug: 'DBG',
      info: 'INF',
      warn: 'WRN',
      error: 'ERR'
    };

    const coloredTimestamp = `\x1b[97m${timestamp}\x1b[0m`;
    const coloredBrackets = `\x1b[37m[\x1b[0m\x1b[36m${entry.service}\x1b[0m\x1b[37m]\x1b[0m`;

    let output = `${levelTag[entry.level]} ${coloredTimestamp} ${coloredBrackets} ${entry.message}`;

    if (entry.error) {
      output += `\n   └─ Error: ${entry.error.message}`;
      if (entry.error.stack && entry.level === 'error') {
        const stackLines = entry.error.stack.split('\n').slice(1, 4);
        stackLines.forEach(line => {
          output += `\n      ${line.trim()}`;
        });
      }
    }

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += '\n   └─ Context:';
      Object.entries(entry.context).forEach(([key, value]) => {
        output += `\n      \x1b[96m${key}\x1b[0m: ${this.formatContextValue(value)}`;
      });
    }

    return output;
  }

  private emit(entry: LogEntry, stream: NodeJS.WriteStream): void {
    if (!this.isLevelEnabled(entry.level)) {
      return;
    }

    // Formatted for dev, JSON lines for prod
    stream.write((this.colorize ? this.formatForDev(entry) : JSON.stringify(entry)) + '\n');

    if (this.toFile) {
      // writeToFile reports its own failures on stderr
      void this.writeToFile(entry);
    }
  }

  private createEntry(level: LogLevel, message: string, context?: Record<string, unknown>): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      service: this.context,
      message,
      context
    };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(this.createEntry('debug', message, context), process.stdout);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(this.createEntry('info', message, context), process.stdout);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(this.createEntry('warn', message, context), process.stderr);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const entry = this.createEntry('error', message, context);

    if (error) {
      entry.error = error instanceof Error
        ? { message: error.message, stack: error.stack }
        : { message: String(error) };
    }

    this.emit(entry, process.stderr);
  }

  private formatContextValue(value: unknown): string {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';

    if (Array.isArray(value)) {
      if (value.length === 0) return '[]';
      const items = value.slice(0, 5).map(v => this.formatContextValue(v));
      if (value.length > 5) items.push('...');
      return `[${items.join(', ')}]`;
    }

    if (typeof value === 'object') {
      const pairs = Object.entries(value).slice(0, 10).map(([k, v]) => `${k}: ${this.formatContextValue(v)}`);
      return pairs.length === 0 ? '{}' : `{ ${pairs.join(', ')} }`;
    }

    if (typeof value === 'string') {
      const shown = value.length > 100 ? `${value.substring(0, 100)}...` : value;
      return `"\x1b[93m${shown}\x1b[0m"`;
    }

    if (typeof value === 'number') {
      return `\x1b[93m${value}\x1b[0m`;
    }

    return String(value);
  }
}

export const createLogger = (context: string, options?: LoggerOptions): Logger => new Logger(context, options);
