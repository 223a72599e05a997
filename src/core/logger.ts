// Default logger, created on first use so importing the package starts no pino transport

import type { ClientLogger } from './interfaces/logger.interface.js';
import { PinoLoggerFactory } from './loggers/pino.logger.js';

let defaultFactory: PinoLoggerFactory | null = null;

export function createDefaultLogger(context: string = 'ChatClient'): ClientLogger {
  if (!defaultFactory) {
    defaultFactory = new PinoLoggerFactory();
  }
  return defaultFactory.createLogger(context);
}

