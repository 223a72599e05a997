// OpenAICompatibleClient - chat completions against any OpenAI-compatible endpoint
// Every outcome, failures included, reaches the caller through its callback

import type { ClientLogger } from './interfaces/logger.interface.js';
import type { Executor } from './interfaces/executor.interface.js';
import type { Transport, TransportResponse } from './interfaces/transport.interface.js';
import { CallbackDispatcher, type QueryCallback } from './CallbackDispatcher.js';
import { ConfigurationError, describeError, toError } from './errors.js';
import { createDefaultLogger } from './logger.js';
import { decodeResponse } from './ResponseDecoder.js';
import { SerialExecutor } from './SerialExecutor.js';
import { decodeStream } from './StreamDecoder.js';
import { UndiciTransport } from './UndiciTransport.js';
import { toConversation, type Conversation, type QueryOptions, type TokenUsage } from './types.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './validation.js';

export interface ClientConfig {
  model: string;
  apiKey: string;
  baseUrl?: string;
  proxy?: string;
  timeoutMs?: number;
  transport?: Transport;
  executor?: Executor;
  logger?: ClientLogger;
}

const encoder = new TextEncoder();

export class OpenAICompatibleClient {
  readonly model: string;
  readonly baseUrl: string;
  readonly url: string;
  private apiKey: string;
  private timeoutMs: number;
  private transport: Transport;
  private dispatcher: CallbackDispatcher;
  private logger: ClientLogger;
  // Only ever incremented; a new client starts from zero
  private usage: TokenUsage = { promptTokens: 0, completionTokens: 0 };

  constructor(config: ClientConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('apiKey is required');
    }

    this.model = config.model;
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.url = `${this.baseUrl}/chat/completions`;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = config.logger ?? createDefaultLogger('OpenAICompatible');
    this.transport = config.transport ?? new UndiciTransport({ proxy: config.proxy });
    this.dispatcher = new CallbackDispatcher(config.executor ?? new SerialExecutor(), this.logger);

    if (config.proxy && !config.transport) {
      this.logger.info('Using proxy', { proxy: config.proxy });
    }
  }

  get inputTokens(): number {
    return this.usage.promptTokens;
  }

  get outputTokens(): number {
    return this.usage.completionTokens;
  }

  getUsage(): TokenUsage {
    return { ...this.usage };
  }

  toString(): string {
    return this.model;
  }

  /**
   * Runs one completion and resolves when the last event has been delivered.
   * Never rejects: transport, HTTP and decode failures become a single error event.
   */
  async query(conversation: Conversation, callback: QueryCallback, options: QueryOptions = {}): Promise<void> {
    const stream = options.stream ?? false;
    const payload = {
      ...options.modelOptions,
      model: this.model,
      messages: toConversation(conversation),
      stream,
    };

    this.logger.info('Requesting model', { model: this.model, stream });

    let response: TransportResponse | null = null;
    try {
      response = await this.transport.execute({
        url: this.url,
        headers: this.headers(),
        body: encoder.encode(JSON.stringify(payload)),
        timeoutMs: this.timeoutMs,
      });
      this.logger.debug('Connection established, processing response', { status: response.status });

      if (stream) {
        await this.consumeStream(response, callback);
      } else {
        await this.consumeResponse(response, callback);
      }
    } catch (error) {
      await this.fail(callback, error);
    } finally {
      if (response) {
        await this.release(response);
      }
    }
  }

  /**
   * Fire-and-forget variant of query(): returns at once, results arrive only through the callback.
   * There is no handle to join or cancel the detached run.
   */
  queryAsync(conversation: Conversation, callback: QueryCallback, options: QueryOptions = {}): void {
    setImmediate(() => {
      this.query(conversation, callback, options).catch((error) =>
        this.logger.error('Detached query failed', { error: toError(error).message }),
      );
    });
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json',
    };
  }

  private async consumeResponse(response: TransportResponse, callback: QueryCallback): Promise<void> {
    const { event, usage } = decodeResponse(await response.readAll());

    if (event.type === 'error') {
      this.logger.error('Model returned an error', { model: this.model, error: event.message });
      await this.dispatcher.deliver(callback, event);
      return;
    }

    if (usage) {
      this.accumulate(usage);
    }
    const { content } = event.message;
    this.logger.debug('Full response', { content: typeof content === 'string' ? content.slice(0, 100) : content });
    await this.dispatcher.deliver(callback, event);
  }

  private async consumeStream(response: TransportResponse, callback: QueryCallback): Promise<void> {
    this.logger.info('Streaming output start', { model: this.model });

    for await (const { event, usage } of decodeStream(() => response.readLine(), this.logger)) {
      if (usage) {
        this.accumulate(usage);
      }

      switch (event.type) {
        case 'delta':
          if (event.content) {
            this.logger.debug('Stream delta', { content: event.content });
          }
          break;
        case 'stop':
          this.logger.info('Streaming finished', { model: this.model });
          break;
        case 'error':
          this.logger.error('Model returned an error mid-stream', { model: this.model, error: event.message });
          break;
      }

      await this.dispatcher.deliver(callback, event);
    }
  }

  private accumulate(usage: TokenUsage): void {
    this.usage.promptTokens += usage.promptTokens;
    this.usage.completionTokens += usage.completionTokens;
  }

  private async fail(callback: QueryCallback, error: unknown): Promise<void> {
    const message = describeError(error);
    this.logger.error(message, { model: this.model });
    await this.dispatcher.deliver(callback, { type: 'error', message });
  }

  private async release(response: TransportResponse): Promise<void> {
    try {
      await response.close();
    } catch (error) {
      this.logger.warn('Failed to release response', { error: toError(error).message });
    }
  }
}
