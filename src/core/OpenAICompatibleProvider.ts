// OpenAICompatibleProvider - menu name, model list and client construction from settings

import type { ClientLogger } from './interfaces/logger.interface.js';
import type { Executor } from './interfaces/executor.interface.js';
import type { Transport } from './interfaces/transport.interface.js';
import { menuName, parseModelList } from './config.js';
import { ConfigurationError } from './errors.js';
import { OpenAICompatibleClient } from './OpenAICompatibleClient.js';
import type { ProviderSettings } from './validation.js';

export interface ClientDependencies {
  transport?: Transport;
  executor?: Executor;
  logger?: ClientLogger;
}

export const OpenAICompatibleProvider = {
  getMenuName(settings: Pick<ProviderSettings, 'name'>): string {
    return menuName(settings);
  },

  supportedModels(settings: Pick<ProviderSettings, 'models'>): string[] {
    return parseModelList(settings.models);
  },

  isConfiguredProperly(settings: Pick<ProviderSettings, 'apiKey'>): boolean {
    return settings.apiKey.trim().length > 0;
  },

  createClient(model: string, settings: ProviderSettings, deps: ClientDependencies = {}): OpenAICompatibleClient {
    if (!OpenAICompatibleProvider.isConfiguredProperly(settings)) {
      throw new ConfigurationError(
        `Please edit the configuration file to insert your ${menuName(settings)} API key!`,
      );
    }

    return new OpenAICompatibleClient({
      model,
      apiKey: settings.apiKey,
      baseUrl: settings.baseUrl,
      proxy: settings.proxy,
      timeoutMs: settings.timeoutMs,
      ...deps,
    });
  },
};
