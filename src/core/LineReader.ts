// LineReader - splits a chunked byte stream on '\n' without decoding it

const NEWLINE = 0x0a;

export interface ByteChunkSource {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
}

export class LineReader {
  private source: ByteChunkSource;
  private buffer: Uint8Array = new Uint8Array(0);
  private exhausted = false;

  constructor(source: ByteChunkSource) {
    this.source = source;
  }

  /**
   * Next line with its terminator; a trailing unterminated line is returned as is at EOF.
   * Returns null once the source is exhausted.
   */
  async readLine(): Promise<Uint8Array | null> {
    while (true) {
      const newline = this.buffer.indexOf(NEWLINE);
      if (newline !== -1) {
        const line = this.buffer.slice(0, newline + 1);
        this.buffer = this.buffer.subarray(newline + 1);
        return line;
      }

      if (this.exhausted) {
        if (this.buffer.length === 0) return null;
        const rest = this.buffer;
        this.buffer = new Uint8Array(0);
        return rest;
      }

      await this.fill();
    }
  }

  async readAll(): Promise<Uint8Array> {
    while (!this.exhausted) {
      await this.fill();
    }
    const all = this.buffer;
    this.buffer = new Uint8Array(0);
    return all;
  }

  async close(): Promise<void> {
    if (this.exhausted) return;
    this.exhausted = true;
    this.buffer = new Uint8Array(0);
    await this.source.cancel();
  }

  private async fill(): Promise<void> {
    const { done, value } = await this.source.read();
    if (done) {
      this.exhausted = true;
      return;
    }
    if (value && value.length > 0) {
      this.buffer = concatBytes(this.buffer, value);
    }
  }
}

function concatBytes(head: Uint8Array, tail: Uint8Array): Uint8Array {
  if (head.length === 0) return tail;
  const joined = new Uint8Array(head.length + tail.length);
  joined.set(head, 0);
  joined.set(tail, head.length);
  return joined;
}
