// Zod schemas for provider settings and OpenAI-compatible response envelopes

import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_MENU_NAME = 'OpenAICompatible';
export const DEFAULT_MODELS: readonly string[] = ['default'];
export const DEFAULT_TIMEOUT_MS = 120_000;

// ============================================
// Settings schemas
// ============================================

export const ProviderSettingsSchema = z.object({
  apiKey: z.string().default(''),
  baseUrl: z.url('baseUrl must be a valid URL').default(DEFAULT_BASE_URL),
  proxy: z.url('proxy must be a valid URL').optional(),
  name: z.string().optional(),
  models: z.string().optional(),
  timeoutMs: z.coerce.number().int().positive('timeoutMs must be a positive integer').default(DEFAULT_TIMEOUT_MS),
});

export type ProviderSettingsInput = z.input<typeof ProviderSettingsSchema>;
export type ProviderSettings = z.output<typeof ProviderSettingsSchema>;

export const ModelListSchema = z.array(z.string());

// ============================================
// Response schemas
// ============================================

export const JsonObjectSchema = z.record(z.string(), z.unknown());

export type JsonObject = z.infer<typeof JsonObjectSchema>;

export const UsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative().nullish(),
  completion_tokens: z.number().int().nonnegative().nullish(),
});

export function isJsonObject(value: unknown): value is JsonObject {
  return JsonObjectSchema.safeParse(value).success;
}

/**
 * First entry of a `choices` array, or an empty object when there is none.
 */
export function firstChoice(body: JsonObject): JsonObject {
  const choices = body.choices;
  if (Array.isArray(choices) && choices.length > 0 && isJsonObject(choices[0])) {
    return choices[0];
  }
  return {};
}
