// Core types for the OpenAI-compatible chat client

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

// Message format (OpenAI-compatible)
export interface ChatMessage {
  role: MessageRole;
  content: string | null;
  name?: string;
  tool_calls?: unknown[];
  tool_call_id?: string;
}

// A bare string is promoted to a single user message
export type Conversation = string | readonly ChatMessage[];

// Caller-supplied extras merged into the request body (temperature, max_tokens, tools, ...)
export type ModelOptions = Record<string, unknown>;

export interface QueryOptions {
  stream?: boolean;
  modelOptions?: ModelOptions;
}

// Token usage reported by the server
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

// Non-stream result, built once per request by toResponseMessage().
// Values are the server's JSON as sent: content may be a string or an array of parts.
export interface ResponseMessage {
  readonly role: unknown;
  readonly content: unknown;
  readonly toolCalls: unknown;
}

// Raw `choices[0].delta` object, passed through untouched
export type StreamDelta = Readonly<Record<string, unknown>>;

export interface ResponseEvent {
  type: 'response';
  message: ResponseMessage;
}

export interface DeltaEvent {
  type: 'delta';
  delta: StreamDelta;
  content: string;
  finishReason: string | null;
}

export interface StopEvent {
  type: 'stop';
}

export interface ErrorEvent {
  type: 'error';
  message: string;
}

export type StreamEvent = DeltaEvent | StopEvent | ErrorEvent;

export type QueryEvent = ResponseEvent | StreamEvent;

// Second callback argument: finish reason for deltas, 'stop' / 'error' for terminal events
export type EventStatus = string | null;

export function statusOf(event: QueryEvent): EventStatus {
  switch (event.type) {
    case 'delta':
      return event.finishReason;
    case 'stop':
      return 'stop';
    case 'error':
      return 'error';
    case 'response':
      return null;
  }
}

export function toConversation(conversation: Conversation): readonly ChatMessage[] {
  if (typeof conversation === 'string') {
    return [{ role: 'user', content: conversation }];
  }
  return conversation;
}
