// UndiciTransport - HTTP POST over undici's fetch, optional proxy, system TLS verification

import { Agent, ProxyAgent, fetch, type Dispatcher, type Response } from 'undici';
import type { Transport, TransportRequest, TransportResponse } from './interfaces/transport.interface.js';
import { HTTPStatusError, TransportError, toError } from './errors.js';
import { LineReader } from './LineReader.js';

export interface UndiciTransportOptions {
  proxy?: string;
  // Overrides proxy/agent selection; tests pass a MockAgent
  dispatcher?: Dispatcher;
}

export class UndiciTransport implements Transport {
  private dispatcher: Dispatcher;

  constructor(options: UndiciTransportOptions = {}) {
    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
    } else if (options.proxy) {
      this.dispatcher = new ProxyAgent(options.proxy);
    } else {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: true } });
    }
  }

  async execute(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    let response: Response;
    try {
      response = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(`request timeout after ${request.timeoutMs}ms`, { cause: error });
      }
      const err = toError(error);
      const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
      throw new TransportError(`${err.message}${cause}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      let body = '';
      try {
        body = await response.text();
      } catch {
        body = '';
      }
      throw new HTTPStatusError(response.status, body, response.statusText);
    }

    if (!response.body) {
      throw new TransportError(`no response body from ${request.url}`);
    }

    const reader = new LineReader(response.body.getReader());
    return {
      status: response.status,
      readAll: () => guardRead(() => reader.readAll()),
      readLine: () => guardRead(() => reader.readLine()),
      close: () => reader.close(),
    };
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

// A dropped connection mid-body is still a transport failure
async function guardRead<T>(read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    throw new TransportError(`connection lost while reading response: ${toError(error).message}`, {
      cause: error,
    });
  }
}
