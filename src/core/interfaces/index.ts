export type { ClientLogger, ClientLoggerFactory } from './logger.interface.js';
export type { Transport, TransportRequest, TransportResponse } from './transport.interface.js';
export type { Executor } from './executor.interface.js';
