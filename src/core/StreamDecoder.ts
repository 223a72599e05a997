// StreamDecoder - line-by-line transducer for `data: ...` event streams
// Malformed frames are skipped; a structured `error` frame or the [DONE] sentinel ends the stream

import type { ClientLogger } from './interfaces/logger.interface.js';
import { extractErrorMessage } from './errors.js';
import { readUsage } from './ResponseDecoder.js';
import type { StreamEvent, TokenUsage } from './types.js';
import { firstChoice, isJsonObject, type JsonObject } from './validation.js';

export const FRAME_PREFIX = 'data: ';
export const DONE_SENTINEL = '[DONE]';

export type FrameResult =
  | { kind: 'skip'; reason: 'undecodable' | 'not-data' | 'malformed-json' }
  | { kind: 'event'; event: StreamEvent; usage: TokenUsage | null };

export interface DecodedFrame {
  event: StreamEvent;
  usage: TokenUsage | null;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function decodeFrame(raw: Uint8Array): FrameResult {
  let line: string;
  try {
    line = utf8.decode(raw).trim();
  } catch {
    return { kind: 'skip', reason: 'undecodable' };
  }

  if (!line.startsWith(FRAME_PREFIX)) {
    return { kind: 'skip', reason: 'not-data' };
  }

  const payload = line.slice(FRAME_PREFIX.length);
  if (payload === DONE_SENTINEL) {
    return { kind: 'event', event: { type: 'stop' }, usage: null };
  }

  let chunk: unknown;
  try {
    chunk = JSON.parse(payload);
  } catch {
    return { kind: 'skip', reason: 'malformed-json' };
  }
  if (!isJsonObject(chunk)) {
    return { kind: 'skip', reason: 'malformed-json' };
  }

  if ('error' in chunk) {
    return { kind: 'event', event: { type: 'error', message: extractErrorMessage(chunk.error) }, usage: null };
  }

  const choice = firstChoice(chunk);
  const delta: JsonObject = isJsonObject(choice.delta) ? choice.delta : {};
  const content = typeof delta.content === 'string' ? delta.content : '';
  const finishReason = typeof choice.finish_reason === 'string' ? choice.finish_reason : null;

  return {
    kind: 'event',
    event: { type: 'delta', delta, content, finishReason },
    usage: readUsage(chunk.usage),
  };
}

/**
 * Pulls lines until a terminal event or EOF, yielding one decoded frame at a time.
 * The next line is not read until the consumer asks for the next frame.
 */
export async function* decodeStream(
  readLine: () => Promise<Uint8Array | null>,
  logger?: ClientLogger,
): AsyncGenerator<DecodedFrame, void, undefined> {
  let lineNumber = 0;

  while (true) {
    const raw = await readLine();
    if (raw === null) {
      logger?.debug('Stream ended without [DONE]', { lines: lineNumber });
      return;
    }
    lineNumber++;

    const result = decodeFrame(raw);
    if (result.kind === 'skip') {
      if (result.reason !== 'not-data') {
        logger?.debug('Skipping unparseable stream line', { line: lineNumber, reason: result.reason });
      }
      continue;
    }

    yield { event: result.event, usage: result.usage };

    if (result.event.type !== 'delta') {
      return;
    }
  }
}
