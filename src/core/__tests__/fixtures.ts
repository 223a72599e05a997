import { vi, type Mock } from 'vitest';
import type { ClientLogger } from '../interfaces/logger.interface.js';
import type { Transport, TransportRequest, TransportResponse } from '../interfaces/transport.interface.js';
import { HTTPStatusError } from '../errors.js';
import type { QueryEvent, EventStatus } from '../types.js';
import { statusCallback, type QueryCallback } from '../CallbackDispatcher.js';

const encoder = new TextEncoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function makeLogger(): Record<keyof ClientLogger, Mock> {
  return {
    debug: vi.fn(),
    log: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

// Feeds readLine() from a fixed list and counts how many lines were pulled
export class ScriptedResponse implements TransportResponse {
  readonly status: number;
  linesRead = 0;
  closed = false;
  private lines: Uint8Array[];
  private body: Uint8Array;
  private failAfter: number | null;

  constructor(options: { status?: number; body?: string; lines?: Array<string | Uint8Array>; failAfter?: number }) {
    this.status = options.status ?? 200;
    this.body = bytes(options.body ?? '');
    this.lines = (options.lines ?? []).map((line) => (typeof line === 'string' ? bytes(`${line}\n`) : line));
    this.failAfter = options.failAfter ?? null;
  }

  async readAll(): Promise<Uint8Array> {
    return this.body;
  }

  async readLine(): Promise<Uint8Array | null> {
    if (this.failAfter !== null && this.linesRead === this.failAfter) {
      throw new Error('socket hang up');
    }
    const line = this.lines[this.linesRead];
    if (line === undefined) return null;
    this.linesRead++;
    return line;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export type FakeReply = ScriptedResponse | HTTPStatusError | Error;

// In-process stand-in for the HTTP layer: replays queued replies and records requests
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private replies: FakeReply[];

  constructor(...replies: FakeReply[]) {
    this.replies = replies;
  }

  async execute(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('FakeTransport: no reply queued');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  lastPayload(): Record<string, unknown> {
    const request = this.requests[this.requests.length - 1];
    return JSON.parse(new TextDecoder().decode(request.body));
  }
}

export interface Recorded {
  event: QueryEvent;
  status: EventStatus;
}

// Records every delivery; resolves `finished` on the first terminal or response event
export function recorder(): { callback: QueryCallback; calls: Recorded[]; finished: Promise<void> } {
  const calls: Recorded[] = [];
  let finish: () => void = () => undefined;
  const finished = new Promise<void>((resolve) => {
    finish = resolve;
  });
  const callback = statusCallback((event, status) => {
    calls.push({ event, status });
    if (event.type !== 'delta') finish();
  });
  return { callback, calls, finished };
}

export function completionBody(content: string, usage?: { prompt_tokens: number; completion_tokens: number }): string {
  return JSON.stringify({
    id: 'chatcmpl-1',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    ...(usage && { usage }),
  });
}

export function deltaFrame(content: string, finishReason: string | null = null, usage?: object): string {
  return `data: ${JSON.stringify({
    choices: [{ index: 0, delta: { content }, finish_reason: finishReason }],
    ...(usage && { usage }),
  })}`;
}
