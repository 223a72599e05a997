// ResponseDecoder - decodes a complete (non-stream) chat completion body

import { DecodeError, extractErrorMessage, toError } from './errors.js';
import type { ErrorEvent, ResponseEvent, ResponseMessage, TokenUsage } from './types.js';
import { UsageSchema, firstChoice, isJsonObject, type JsonObject } from './validation.js';

export interface DecodedResponse {
  event: ResponseEvent | ErrorEvent;
  usage: TokenUsage | null;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

// Fields are copied verbatim; only a missing key becomes null
export function toResponseMessage(raw: JsonObject): ResponseMessage {
  return Object.freeze({
    role: raw.role ?? null,
    content: raw.content ?? null,
    toolCalls: raw.tool_calls ?? null,
  });
}

/**
 * Reads `prompt_tokens` / `completion_tokens` from a `usage` field.
 * Returns null when the field is absent, empty, or not a usage object.
 */
export function readUsage(raw: unknown): TokenUsage | null {
  if (!isJsonObject(raw) || Object.keys(raw).length === 0) {
    return null;
  }
  const parsed = UsageSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  return {
    promptTokens: parsed.data.prompt_tokens ?? 0,
    completionTokens: parsed.data.completion_tokens ?? 0,
  };
}

export function decodeResponse(body: Uint8Array): DecodedResponse {
  let data: unknown;
  try {
    data = JSON.parse(utf8.decode(body));
  } catch (error) {
    throw new DecodeError(`invalid JSON in response body: ${toError(error).message}`, { cause: error });
  }

  if (!isJsonObject(data)) {
    throw new DecodeError('response body is not a JSON object');
  }

  if ('error' in data) {
    return { event: { type: 'error', message: extractErrorMessage(data.error) }, usage: null };
  }

  const message = firstChoice(data).message;
  if (!isJsonObject(message)) {
    throw new DecodeError('response is missing choices[0].message');
  }

  return {
    event: { type: 'response', message: toResponseMessage(message) },
    usage: readUsage(data.usage),
  };
}
