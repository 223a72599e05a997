// ConsoleLogger - Logger implementation writing to the console

import type { ClientLogger, ClientLoggerFactory } from '../interfaces/logger.interface.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class ConsoleLogger implements ClientLogger {
  private context: string;
  private level: LogLevel;

  constructor(context: string = 'ChatClient', level: LogLevel = 'info') {
    this.context = context;
    this.level = level;
  }

  private shouldLog(msgLevel: LogLevel): boolean {
    return LEVELS.indexOf(msgLevel) >= LEVELS.indexOf(this.level);
  }

  private formatMessage(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}${contextStr}`;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message, context));
    }
  }

  log(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, context));
    }
  }
}

export class ConsoleLoggerFactory implements ClientLoggerFactory {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  createLogger(context: string): ClientLogger {
    return new ConsoleLogger(context, this.level);
  }
}
