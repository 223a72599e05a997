// Provider settings: environment loading and normalization

import { ConfigurationError } from './errors.js';
import {
  DEFAULT_MENU_NAME,
  DEFAULT_MODELS,
  ModelListSchema,
  ProviderSettingsSchema,
  type ProviderSettings,
  type ProviderSettingsInput,
} from './validation.js';

export const ENV_KEYS = {
  apiKey: 'OPENAI_COMPATIBLE_API_KEY',
  baseUrl: 'OPENAI_COMPATIBLE_BASE_URL',
  proxy: 'OPENAI_COMPATIBLE_PROXY',
  name: 'OPENAI_COMPATIBLE_NAME',
  models: 'OPENAI_COMPATIBLE_MODELS',
  timeoutMs: 'OPENAI_COMPATIBLE_TIMEOUT_MS',
} as const;

export function parseProviderSettings(input: ProviderSettingsInput): ProviderSettings {
  const result = ProviderSettingsSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid provider settings (${details.join('; ')})`);
  }
  return { ...result.data, baseUrl: result.data.baseUrl.replace(/\/+$/, '') };
}

// Unset and blank variables both fall back to the schema defaults
export function loadProviderSettings(env: NodeJS.ProcessEnv = process.env): ProviderSettings {
  const read = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };

  return parseProviderSettings({
    apiKey: read(ENV_KEYS.apiKey),
    baseUrl: read(ENV_KEYS.baseUrl),
    proxy: read(ENV_KEYS.proxy),
    name: read(ENV_KEYS.name),
    models: read(ENV_KEYS.models),
    timeoutMs: read(ENV_KEYS.timeoutMs),
  });
}

/**
 * Parses the configured model list: a JSON array of names, otherwise a comma-separated list.
 */
export function parseModelList(raw: string | undefined): string[] {
  if (!raw || !raw.trim()) {
    return [...DEFAULT_MODELS];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    parsed = undefined;
  }

  const fromJson = ModelListSchema.safeParse(parsed);
  const names = fromJson.success ? fromJson.data : raw.split(',');
  const models = names.map((name) => name.trim()).filter((name) => name.length > 0);
  return models.length > 0 ? models : [...DEFAULT_MODELS];
}

export function menuName(settings: Pick<ProviderSettings, 'name'>): string {
  return settings.name?.trim() || DEFAULT_MENU_NAME;
}
