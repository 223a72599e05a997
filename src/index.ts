// OpenAI-compatible chat client
// Main entry point and exports

import { config } from 'dotenv';
import { loadProviderSettings } from './core/config.js';
import type { OpenAICompatibleClient } from './core/OpenAICompatibleClient.js';
import { OpenAICompatibleProvider, type ClientDependencies } from './core/OpenAICompatibleProvider.js';
import type { ProviderSettings } from './core/validation.js';

export * from './core/index.js';

// ==================== FACTORY FUNCTIONS ====================

/**
 * Resolve provider settings from `.env` and the process environment.
 * Variables already set in the environment win over the `.env` file.
 */
export function loadSettingsFromEnv(path?: string): ProviderSettings {
  config({ path, quiet: true });
  return loadProviderSettings(process.env);
}

/**
 * Create a client for `model` (defaults to the first configured model) from environment settings.
 *
 * @example
 * const client = createClientFromEnv();
 * client.queryAsync('Explain this function', statusCallback((event, status) => render(event, status)), {
 *   stream: true,
 * });
 */
export function createClientFromEnv(model?: string, deps: ClientDependencies = {}): OpenAICompatibleClient {
  const settings = loadSettingsFromEnv();
  const selected = model ?? OpenAICompatibleProvider.supportedModels(settings)[0];
  return OpenAICompatibleProvider.createClient(selected, settings, deps);
}
