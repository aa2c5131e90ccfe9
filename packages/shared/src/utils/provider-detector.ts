import type { LanguageModel } from 'ai';

export type ProviderType =
  | 'openai'
  | 'google'
  | 'anthropic'
  | 'togetherai'
  | 'unknown';

const PROVIDER_PATTERNS: ReadonlyArray<[string, ProviderType]> = [
  ['openai', 'openai'],
  ['azure', 'openai'],
  ['google', 'google'],
  ['vertex', 'google'],
  ['anthropic', 'anthropic'],
  ['together', 'togetherai'],
];

/**
 * Detect the provider behind a model.
 *
 * Provider instances expose a `provider` id such as `openai.chat`; gateway
 * model strings carry the provider as their first path segment
 * (`anthropic/claude-sonnet-4.5`).
 */
export function detectProvider(model: LanguageModel): ProviderType {
  const providerId =
    typeof model === 'string' ? model.split('/')[0] : model.provider;
  if (typeof providerId !== 'string' || providerId === '') return 'unknown';

  const id = providerId.toLowerCase();
  for (const [pattern, type] of PROVIDER_PATTERNS) {
    if (id.includes(pattern)) return type;
  }
  return 'unknown';
}

/**
 * Model identifier used for pricing lookups and usage reports.
 */
export function getModelName(model: LanguageModel): string {
  if (typeof model === 'string') return model;
  return typeof model.modelId === 'string' && model.modelId !== ''
    ? model.modelId
    : String(model.provider);
}
