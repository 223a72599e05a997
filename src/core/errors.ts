// Error taxonomy for the chat client
// Everything below is caught at the client boundary and turned into one ErrorEvent

export class ClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Connection, DNS, TLS or timeout failure before or during the exchange
export class TransportError extends ClientError {}

// Non-2xx response; body is the best-effort decoded payload (may be empty)
export class HTTPStatusError extends ClientError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, statusText = '') {
    super(`HTTP ${status}: ${body || statusText}`);
    this.status = status;
    this.body = body;
  }
}

// Whole-body JSON that cannot be decoded (non-stream mode only)
export class DecodeError extends ClientError {}

export class ConfigurationError extends ClientError {}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Message carried by the ErrorEvent for a failed query.
 */
export function describeError(error: unknown): string {
  if (error instanceof HTTPStatusError) {
    return error.message;
  }
  return `General exception encountered while running the query: ${toError(error).message}`;
}

/**
 * Text form of a server-reported `error` field.
 * Strings pass through, `{ message }` objects yield the message, anything else is JSON-encoded.
 */
export function extractErrorMessage(errorField: unknown): string {
  if (typeof errorField === 'string') {
    return errorField;
  }
  if (typeof errorField === 'object' && errorField !== null && 'message' in errorField) {
    const { message } = errorField;
    if (typeof message === 'string') {
      return message;
    }
  }
  return JSON.stringify(errorField) ?? String(errorField);
}
