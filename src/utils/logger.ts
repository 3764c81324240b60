// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import type { Writable } from 'stream';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Environment variable holding the log threshold */
export const LOG_LEVEL_ENV = 'VYOS_LOG_LEVEL';

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private readonly name: string;
  private readonly output: Writable;

  constructor(name: string, output: Writable = process.stderr) {
    this.name = name;
    this.output = output;
  }

  private getConfiguredLogLevel(): LogLevel {
    const configured = (process.env[LOG_LEVEL_ENV] ?? '').trim().toLowerCase();
    return isLogLevel(configured) ? configured : 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    const configuredLevel = this.getConfiguredLogLevel();
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(configuredLevel);
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] [${this.name}] ${message}`;
  }

  private appendLine(line: string): void {
    this.output.write(`${line}\n`);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, error?: Error, ...args: unknown[]): void {
    if (!this.shouldLog('error')) {
      return;
    }
    this.appendLine(this.formatMessage('error', message));
    if (error) {
      this.appendLine(`Error: ${error.message}`);
      if (error.stack) {
        this.appendLine(error.stack);
      }
    }
    if (args.length > 0) {
      this.appendLine(JSON.stringify(args, null, 2));
    }
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) {
      return;
    }
    this.appendLine(this.formatMessage(level, message));
    if (args.length > 0) {
      this.appendLine(JSON.stringify(args, null, 2));
    }
  }
}

// Singleton logger instance
let defaultLogger: Logger | undefined;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger('vyos-batch');
  }
  return defaultLogger;
}
