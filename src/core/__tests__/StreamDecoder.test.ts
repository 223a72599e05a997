import { describe, it, expect } from 'vitest';
import { decodeFrame, decodeStream, type DecodedFrame } from '../StreamDecoder.js';
import { ScriptedResponse, bytes, deltaFrame, makeLogger } from './fixtures.js';

async function collect(response: ScriptedResponse): Promise<DecodedFrame[]> {
  const frames: DecodedFrame[] = [];
  for await (const frame of decodeStream(() => response.readLine())) {
    frames.push(frame);
  }
  return frames;
}

// =============================================
// decodeFrame
// =============================================
describe('decodeFrame', () => {
  it('skips blank keep-alive lines and comments', () => {
    expect(decodeFrame(bytes('\n'))).toEqual({ kind: 'skip', reason: 'not-data' });
    expect(decodeFrame(bytes(': keep-alive\n'))).toEqual({ kind: 'skip', reason: 'not-data' });
    expect(decodeFrame(bytes('event: message\n'))).toEqual({ kind: 'skip', reason: 'not-data' });
  });

  it('recognises the [DONE] sentinel as a stop event', () => {
    expect(decodeFrame(bytes('data: [DONE]\r\n'))).toEqual({ kind: 'event', event: { type: 'stop' }, usage: null });
  });

  it('skips frames whose payload is not JSON', () => {
    expect(decodeFrame(bytes('data: {not valid json\n'))).toEqual({ kind: 'skip', reason: 'malformed-json' });
    expect(decodeFrame(bytes('data: 42\n'))).toEqual({ kind: 'skip', reason: 'malformed-json' });
  });

  it('skips lines that are not valid UTF-8', () => {
    const raw = new Uint8Array([0x64, 0x61, 0x74, 0x61, 0x3a, 0x20, 0xff, 0xfe, 0x0a]);
    expect(decodeFrame(raw)).toEqual({ kind: 'skip', reason: 'undecodable' });
  });

  it('extracts delta, content and finish reason', () => {
    const result = decodeFrame(bytes(`${deltaFrame('Hel')}\n`));
    expect(result).toEqual({
      kind: 'event',
      event: { type: 'delta', delta: { content: 'Hel' }, content: 'Hel', finishReason: null },
      usage: null,
    });
  });

  it('emits a delta with empty content when only the finish reason changes', () => {
    const result = decodeFrame(bytes('data: {"choices":[{"delta":{},"finish_reason":"length"}]}'));
    expect(result).toEqual({
      kind: 'event',
      event: { type: 'delta', delta: {}, content: '', finishReason: 'length' },
      usage: null,
    });
  });

  it('treats an empty choices list as an empty delta', () => {
    const result = decodeFrame(bytes('data: {"choices":[],"usage":{"prompt_tokens":12,"completion_tokens":7}}'));
    expect(result).toEqual({
      kind: 'event',
      event: { type: 'delta', delta: {}, content: '', finishReason: null },
      usage: { promptTokens: 12, completionTokens: 7 },
    });
  });

  it('passes tool call deltas through untouched', () => {
    const toolCalls = [{ index: 0, id: 'call_1', function: { name: 'rename', arguments: '{"a"' } }];
    const result = decodeFrame(bytes(`data: ${JSON.stringify({ choices: [{ delta: { tool_calls: toolCalls } }] })}`));
    expect(result.kind).toBe('event');
    if (result.kind === 'event' && result.event.type === 'delta') {
      expect(result.event.delta).toEqual({ tool_calls: toolCalls });
      expect(result.event.content).toBe('');
    }
  });

  it('ignores an empty usage object', () => {
    const result = decodeFrame(bytes(deltaFrame('x', null, {})));
    expect(result.kind === 'event' && result.usage).toBeNull();
  });

  it('turns a string error frame into an error event', () => {
    expect(decodeFrame(bytes('data: {"error":"boom"}'))).toEqual({
      kind: 'event',
      event: { type: 'error', message: 'boom' },
      usage: null,
    });
  });

  it('uses the nested message of a structured error frame', () => {
    expect(decodeFrame(bytes('data: {"error":{"message":"overloaded","code":529}}'))).toEqual({
      kind: 'event',
      event: { type: 'error', message: 'overloaded' },
      usage: null,
    });
  });

  it('treats an error key with a null value as an error frame', () => {
    expect(decodeFrame(bytes('data: {"error":null,"choices":[{"delta":{"content":"x"}}]}'))).toEqual({
      kind: 'event',
      event: { type: 'error', message: 'null' },
      usage: null,
    });
  });

  it('stringifies an error frame without a message', () => {
    expect(decodeFrame(bytes('data: {"error":{"code":500}}'))).toEqual({
      kind: 'event',
      event: { type: 'error', message: '{"code":500}' },
      usage: null,
    });
  });
});

// =============================================
// decodeStream
// =============================================
describe('decodeStream', () => {
  it('yields deltas in order followed by a stop event', async () => {
    const response = new ScriptedResponse({
      lines: [deltaFrame('A'), '', deltaFrame('B', 'stop'), '', 'data: [DONE]', '', deltaFrame('late')],
    });

    const frames = await collect(response);

    expect(frames.map((f) => f.event)).toEqual([
      { type: 'delta', delta: { content: 'A' }, content: 'A', finishReason: null },
      { type: 'delta', delta: { content: 'B' }, content: 'B', finishReason: 'stop' },
      { type: 'stop' },
    ]);
    // Nothing after [DONE] is read
    expect(response.linesRead).toBe(5);
  });

  it('drops a malformed frame between two valid ones', async () => {
    const response = new ScriptedResponse({
      lines: [deltaFrame('one'), 'data: {not valid json', deltaFrame('two')],
    });

    const frames = await collect(response);

    expect(frames.map((f) => f.event.type)).toEqual(['delta', 'delta']);
    expect(frames.map((f) => (f.event.type === 'delta' ? f.event.content : ''))).toEqual(['one', 'two']);
  });

  it('stops at the first structured error frame', async () => {
    const response = new ScriptedResponse({
      lines: [deltaFrame('first'), 'data: {"error":"boom"}', deltaFrame('after'), 'data: [DONE]'],
    });

    const frames = await collect(response);

    expect(frames.map((f) => f.event)).toEqual([
      { type: 'delta', delta: { content: 'first' }, content: 'first', finishReason: null },
      { type: 'error', message: 'boom' },
    ]);
    expect(response.linesRead).toBe(2);
  });

  it('ends silently at EOF without a sentinel', async () => {
    const response = new ScriptedResponse({ lines: [deltaFrame('only')] });

    const frames = await collect(response);

    expect(frames).toHaveLength(1);
    expect(frames[0].event.type).toBe('delta');
  });

  it('attaches usage to the frame that carried it', async () => {
    const response = new ScriptedResponse({
      lines: [deltaFrame('a'), deltaFrame('', 'stop', { prompt_tokens: 9, completion_tokens: 3 }), 'data: [DONE]'],
    });

    const frames = await collect(response);

    expect(frames.map((f) => f.usage)).toEqual([null, { promptTokens: 9, completionTokens: 3 }, null]);
  });

  it('logs skipped frames at debug level but not plain non-data lines', async () => {
    const logger = makeLogger();
    const response = new ScriptedResponse({ lines: ['', ': ping', 'data: {oops', 'data: [DONE]'] });

    for await (const frame of decodeStream(() => response.readLine(), logger)) {
      expect(frame.event.type).toBe('stop');
    }

    expect(logger.debug).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith('Skipping unparseable stream line', { line: 3, reason: 'malformed-json' });
  });

  it('does not read ahead of the consumer', async () => {
    const response = new ScriptedResponse({ lines: [deltaFrame('a'), deltaFrame('b'), deltaFrame('c')] });
    const stream = decodeStream(() => response.readLine());

    await stream.next();
    expect(response.linesRead).toBe(1);
    await stream.next();
    expect(response.linesRead).toBe(2);
    await stream.return();
  });
});
