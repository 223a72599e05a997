// Core module exports

// Components
export { OpenAICompatibleClient } from './OpenAICompatibleClient.js';
export type { ClientConfig } from './OpenAICompatibleClient.js';
export { OpenAICompatibleProvider } from './OpenAICompatibleProvider.js';
export type { ClientDependencies } from './OpenAICompatibleProvider.js';
export { CallbackDispatcher, eventCallback, statusCallback } from './CallbackDispatcher.js';
export type { EventHandler, QueryCallback, StatusHandler } from './CallbackDispatcher.js';
export { SerialExecutor } from './SerialExecutor.js';
export { UndiciTransport } from './UndiciTransport.js';
export type { UndiciTransportOptions } from './UndiciTransport.js';
export { LineReader } from './LineReader.js';
export { decodeResponse, readUsage, toResponseMessage } from './ResponseDecoder.js';
export { decodeFrame, decodeStream, DONE_SENTINEL, FRAME_PREFIX } from './StreamDecoder.js';
export type { DecodedFrame, FrameResult } from './StreamDecoder.js';

// Types, errors and settings
export * from './types.js';
export * from './errors.js';
export { ENV_KEYS, loadProviderSettings, parseModelList, parseProviderSettings } from './config.js';
export {
  DEFAULT_BASE_URL,
  DEFAULT_MENU_NAME,
  DEFAULT_MODELS,
  DEFAULT_TIMEOUT_MS,
  ProviderSettingsSchema,
} from './validation.js';
export type { ProviderSettings, ProviderSettingsInput } from './validation.js';

// Interfaces
export type * from './interfaces/index.js';

// Loggers
export * from './loggers/index.js';
export { createDefaultLogger } from './logger.js';
