import type { z } from 'zod';

import {
  type LanguageModel,
  type ModelMessage,
  NoObjectGeneratedError,
  Output,
  generateText,
  hasToolCall,
  tool,
} from 'ai';

import { detectProvider, getModelName } from './provider-detector';

/**
 * Configuration for a structured vision call
 */
export interface LLMVisionCallConfig<TOutput> {
  /**
   * Zod schema the response must satisfy
   */
  schema: z.ZodType<TOutput>;

  /**
   * Conversation sent to the model, typically one user message holding a
   * text part and an image part
   */
  messages: ModelMessage[];

  /**
   * Primary model for the call
   */
  primaryModel: LanguageModel;

  /**
   * Model tried once after the primary model fails (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Transport-level retries per model, handled by the AI SDK
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal; an aborted call never falls back
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for usage tracking (e.g. 'LLMVisualAnalyzer')
   */
  component: string;

  /**
   * Phase name for usage tracking (e.g. 'page-analysis')
   */
  phase: string;
}

/**
 * Token usage of one call, tagged with the model that served it
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of an LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  /** Usage of the model that answered, summed over its attempts */
  usage: ExtendedTokenUsage;
  /** Usage of every model tried, primary first */
  billedUsage: ExtendedTokenUsage[];
  usedFallback: boolean;
}

/**
 * Thrown by LLMCaller.callVision when no model produced a result.
 * Carries the usage billed before the failure; `cause` holds the last error.
 */
export class LLMCallError extends Error {
  constructor(
    message: string,
    public readonly billedUsage: ExtendedTokenUsage[],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'LLMCallError';
  }

  static fromError(
    error: unknown,
    billedUsage: ExtendedTokenUsage[],
  ): LLMCallError {
    return new LLMCallError(
      error instanceof Error ? error.message : String(error),
      billedUsage,
      { cause: error },
    );
  }
}

interface TokenCounts {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/** Running token totals for one model across its attempts */
interface UsageTally {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

interface PromptParams {
  messages: ModelMessage[];
  temperature?: number;
  maxRetries: number;
  abortSignal?: AbortSignal;
}

/**
 * LLMCaller - structured vision calls with provider-aware output handling
 * and a single fallback hop.
 *
 * 1. Call the primary model
 * 2. On failure (unless aborted) call the fallback model, if any
 * 3. Report the token usage billed by every attempt, failed ones included
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.callVision({
 *   schema: pageAnalysisSchema,
 *   messages,
 *   primaryModel: openai('gpt-5-mini'),
 *   maxRetries: 2,
 *   component: 'LLMVisualAnalyzer',
 *   phase: 'page-analysis',
 * });
 * ```
 */
export class LLMCaller {
  /**
   * Extra attempts when a model returns output that fails the schema.
   * Total attempts = MAX_STRUCTURED_OUTPUT_RETRIES + 1.
   */
  static readonly MAX_STRUCTURED_OUTPUT_RETRIES = 2;

  private static buildUsage(
    config: Pick<LLMVisionCallConfig<unknown>, 'component' | 'phase'>,
    modelName: string,
    tally: UsageTally,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      ...tally,
    };
  }

  private static emptyTally(): UsageTally {
    return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
  }

  private static addUsage(
    tally: UsageTally,
    usage: TokenCounts | undefined,
  ): void {
    const inputTokens = usage?.inputTokens ?? 0;
    const outputTokens = usage?.outputTokens ?? 0;
    tally.inputTokens += inputTokens;
    tally.outputTokens += outputTokens;
    tally.totalTokens += usage?.totalTokens ?? inputTokens + outputTokens;
  }

  /**
   * Structured output through a forced tool call, for providers whose
   * native structured output is unreliable (Together AI, unknown).
   *
   * @throws NoObjectGeneratedError when no attempt produces a tool call
   */
  private static async generateViaToolCall<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    params: PromptParams,
    tally: UsageTally,
  ): Promise<TOutput> {
    const submitResult = tool({
      description: 'Submit the structured result',
      inputSchema: schema,
    });

    for (let attempt = 0; ; attempt++) {
      const result = await generateText({
        ...params,
        model,
        tools: { submitResult },
        toolChoice: { type: 'tool', toolName: 'submitResult' },
        stopWhen: hasToolCall('submitResult'),
      });
      this.addUsage(tally, result.usage);

      const toolCall = result.toolCalls.find(
        (call) => call.toolName === 'submitResult',
      );
      if (toolCall) {
        return schema.parse(toolCall.input);
      }

      if (attempt >= this.MAX_STRUCTURED_OUTPUT_RETRIES) {
        throw new NoObjectGeneratedError({
          message: 'Model did not produce a tool call for structured output',
          text: result.text,
          response: result.response,
          usage: result.usage,
          finishReason: result.finishReason,
        });
      }
    }
  }

  /**
   * Structured output with the strategy suited to the model's provider.
   * Schema mismatches (NoObjectGeneratedError) are retried; anything else
   * propagates immediately. Usage of every attempt, failed ones included,
   * is added to `tally`.
   */
  private static async generateStructuredOutput<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    params: PromptParams,
    tally: UsageTally,
  ): Promise<TOutput> {
    const providerType = detectProvider(model);

    if (providerType === 'togetherai' || providerType === 'unknown') {
      return this.generateViaToolCall(model, schema, params, tally);
    }

    for (let attempt = 0; ; attempt++) {
      try {
        const result = await generateText({
          ...params,
          model,
          output: Output.object({ schema }),
        });
        this.addUsage(tally, result.usage);
        return result.output;
      } catch (error) {
        if (!NoObjectGeneratedError.isInstance(error)) throw error;
        this.addUsage(tally, error.usage);
        if (attempt >= this.MAX_STRUCTURED_OUTPUT_RETRIES) throw error;
      }
    }
  }

  /**
   * Call a vision model with fallback support.
   *
   * @throws LLMCallError wrapping the last model error, with the usage of
   * every model tried
   */
  static async callVision<TOutput>(
    config: LLMVisionCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    const params: PromptParams = {
      messages: config.messages,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    };
    const primaryName = getModelName(config.primaryModel);
    const primaryTally = this.emptyTally();

    let output: TOutput;
    try {
      output = await this.generateStructuredOutput(
        config.primaryModel,
        config.schema,
        params,
        primaryTally,
      );
    } catch (primaryError) {
      const primaryUsage = this.buildUsage(
        config,
        primaryName,
        primaryTally,
        false,
      );
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw LLMCallError.fromError(primaryError, [primaryUsage]);
      }
      return this.callFallback(
        config,
        config.fallbackModel,
        params,
        primaryUsage,
      );
    }

    const usage = this.buildUsage(config, primaryName, primaryTally, false);
    return { output, usage, billedUsage: [usage], usedFallback: false };
  }

  private static async callFallback<TOutput>(
    config: LLMVisionCallConfig<TOutput>,
    fallbackModel: LanguageModel,
    params: PromptParams,
    primaryUsage: ExtendedTokenUsage,
  ): Promise<LLMCallResult<TOutput>> {
    const fallbackName = getModelName(fallbackModel);
    const tally = this.emptyTally();

    try {
      const output = await this.generateStructuredOutput(
        fallbackModel,
        config.schema,
        params,
        tally,
      );
      const usage = this.buildUsage(config, fallbackName, tally, true);
      return {
        output,
        usage,
        billedUsage: [primaryUsage, usage],
        usedFallback: true,
      };
    } catch (fallbackError) {
      throw LLMCallError.fromError(fallbackError, [
        primaryUsage,
        this.buildUsage(config, fallbackName, tally, true),
      ]);
    }
  }
}
