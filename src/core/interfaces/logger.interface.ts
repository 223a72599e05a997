// ClientLogger - Framework-agnostic logger interface
// Lets the host plug in pino, console, or its own output window

export interface ClientLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  log(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

// Factory type for creating child loggers with context
export interface ClientLoggerFactory {
  createLogger(context: string): ClientLogger;
}
