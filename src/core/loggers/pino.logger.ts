// PinoLogger - Logger implementation wrapping pino

import { pino, type Logger, type LoggerOptions } from 'pino';
import type { ClientLogger, ClientLoggerFactory } from '../interfaces/logger.interface.js';

export class PinoLogger implements ClientLogger {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context || {}, message);
  }

  log(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context || {}, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context || {}, message);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.logger.error(context || {}, message);
  }
}

export class PinoLoggerFactory implements ClientLoggerFactory {
  private baseLogger: Logger;

  constructor(options?: LoggerOptions) {
    this.baseLogger = pino({
      level: process.env.LOG_LEVEL || 'info',
      ...(process.env.NODE_ENV !== 'production' && {
        transport: { target: 'pino-pretty', options: { colorize: true } },
      }),
      ...options,
    });
  }

  createLogger(context: string): ClientLogger {
    return new PinoLogger(this.baseLogger.child({ context }));
  }
}
