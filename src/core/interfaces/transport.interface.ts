// Transport - one HTTP POST per call, no retries
// Implementations throw HTTPStatusError for non-2xx and TransportError for everything network-level

export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  body: Uint8Array;
  timeoutMs: number;
}

export interface TransportResponse {
  readonly status: number;
  // Whole body; only valid when readLine() has not been used
  readAll(): Promise<Uint8Array>;
  // Next raw line including its terminator, or null at EOF
  readLine(): Promise<Uint8Array | null>;
  // Release the connection; unread body bytes are discarded
  close(): Promise<void>;
}

export interface Transport {
  execute(request: TransportRequest): Promise<TransportResponse>;
}
