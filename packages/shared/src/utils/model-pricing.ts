/**
 * Vision model pricing in USD per 1 million tokens.
 *
 * Keys are the model ids reported by the provider (or gateway ids).
 * Models missing from the table have no token-based price; callers fall
 * back to a flat per-call estimate.
 */
export const MODEL_PRICING: Readonly<
  Record<string, { input: number; output: number }>
> = {
  // OpenAI
  'gpt-4o': { input: 2.5, output: 10 },
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-5': { input: 1.25, output: 10 },
  'gpt-5-mini': { input: 0.25, output: 2 },
  'openai/gpt-5-mini': { input: 0.25, output: 2 },
  // Google
  'gemini-2.5-flash': { input: 0.3, output: 2.5 },
  'gemini-2.5-pro': { input: 1.25, output: 10 },
  // Anthropic
  'claude-haiku-4-5': { input: 1, output: 5 },
  'claude-sonnet-4-5': { input: 3, output: 15 },
  'anthropic/claude-sonnet-4.5': { input: 3, output: 15 },
};

/**
 * Calculate the cost of a call from its token usage.
 *
 * @returns Cost in USD, or `undefined` when the model has no pricing entry
 */
export function calculateCost(
  modelName: string,
  inputTokens: number,
  outputTokens: number,
): number | undefined {
  if (!Object.hasOwn(MODEL_PRICING, modelName)) return undefined;
  const pricing = MODEL_PRICING[modelName];
  return (
    (inputTokens / 1_000_000) * pricing.input +
    (outputTokens / 1_000_000) * pricing.output
  );
}
