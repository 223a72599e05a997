// CallbackDispatcher - delivers query events to the caller on the designated executor

import type { ClientLogger } from './interfaces/logger.interface.js';
import type { Executor } from './interfaces/executor.interface.js';
import { toError } from './errors.js';
import { statusOf, type EventStatus, type QueryEvent } from './types.js';

export type EventHandler = (event: QueryEvent) => void;
export type StatusHandler = (event: QueryEvent, status: EventStatus) => void;

// Callback shape is fixed when the callback is registered, never probed per call
export type QueryCallback = { arity: 1; fn: EventHandler } | { arity: 2; fn: StatusHandler };

export function eventCallback(fn: EventHandler): QueryCallback {
  return { arity: 1, fn };
}

export function statusCallback(fn: StatusHandler): QueryCallback {
  return { arity: 2, fn };
}

export class CallbackDispatcher {
  private executor: Executor;
  private logger: ClientLogger;

  constructor(executor: Executor, logger: ClientLogger) {
    this.executor = executor;
    this.logger = logger;
  }

  /**
   * Resolves once the callback has run. A throwing callback is logged and does not
   * stop the caller from delivering later events.
   */
  async deliver(callback: QueryCallback, event: QueryEvent): Promise<void> {
    try {
      await this.executor.run(() => invoke(callback, event));
    } catch (error) {
      this.logger.error('Query callback threw', { event: event.type, error: toError(error).message });
    }
  }
}

function invoke(callback: QueryCallback, event: QueryEvent): void {
  switch (callback.arity) {
    case 1:
      callback.fn(event);
      return;
    case 2:
      callback.fn(event, statusOf(event));
      return;
  }
}
