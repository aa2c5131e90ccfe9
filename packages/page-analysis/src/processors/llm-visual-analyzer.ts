import type { LoggerMethods } from '@pagewise/logger';
import type {
  AnalysisFailureReason,
  VisualAnalysisOutcome,
} from '@pagewise/model';
import type { LanguageModel, ModelMessage } from 'ai';

import type {
  VisualAnalysisRequest,
  VisualAnalyzer,
} from '../types/collaborators';

import type { ExtendedTokenUsage } from '@pagewise/shared';

import {
  LLMCallError,
  LLMCaller,
  calculateCost,
  getModelName,
} from '@pagewise/shared';

import { BUDGET_LEDGER, PAGE_ANALYSIS_PIPELINE } from '../config/constants';
import { pageVisualAnalysisSchema } from '../types/page-visual-analysis-schema';

/** Sampling temperature for page analysis */
const DEFAULT_TEMPERATURE = 0.1;

interface BilledCost {
  costUsd: number;
  inputTokens: number;
  outputTokens: number;
}

export interface LLMVisualAnalyzerOptions {
  model: LanguageModel;
  /** Tried once when the primary model fails (optional) */
  fallbackModel?: LanguageModel;
  /** Cost charged when the model has no pricing entry (default: 0.00765) */
  costPerCall?: number;
  /** Transport retries per model (default: 1) */
  maxRetries?: number;
  /** Generation temperature (default: 0.1) */
  temperature?: number;
}

/**
 * VisualAnalyzer backed by a vision language model through the AI SDK.
 *
 * Sends the page image with its prompt, validates the structured answer
 * against `pageVisualAnalysisSchema` and prices the call from the token
 * usage of every attempt, failed ones included. Errors become unsuccessful
 * outcomes; nothing is thrown.
 */
export class LLMVisualAnalyzer implements VisualAnalyzer {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly options: LLMVisualAnalyzerOptions,
  ) {}

  async analyze(request: VisualAnalysisRequest): Promise<VisualAnalysisOutcome> {
    const { image, prompt, abortSignal } = request;
    const startedAt = Date.now();

    this.logger.debug(
      `[LLMVisualAnalyzer] Analyzing page ${image.pageNumber} (${image.sizeKb.toFixed(1)}KB)...`,
    );

    const messages: ModelMessage[] = [
      {
        role: 'user',
        content: [
          { type: 'text', text: prompt },
          {
            type: 'image',
            image: `data:${image.mimeType};base64,${Buffer.from(image.data).toString('base64')}`,
          },
        ],
      },
    ];

    try {
      const result = await LLMCaller.callVision({
        schema: pageVisualAnalysisSchema,
        messages,
        primaryModel: this.options.model,
        fallbackModel: this.options.fallbackModel,
        maxRetries:
          this.options.maxRetries ?? PAGE_ANALYSIS_PIPELINE.DEFAULT_MAX_RETRIES,
        temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
        abortSignal,
        component: 'LLMVisualAnalyzer',
        phase: 'page-analysis',
      });

      const { modelName } = result.usage;
      const { costUsd, inputTokens, outputTokens } = this.price(
        result.billedUsage,
        result.usage,
      );
      const durationMs = Date.now() - startedAt;

      this.logger.debug(
        `[LLMVisualAnalyzer] Page ${image.pageNumber} analyzed by ${modelName}${result.usedFallback ? ' (fallback)' : ''} in ${durationMs}ms, $${costUsd.toFixed(4)}`,
      );

      return {
        success: true,
        analysis: result.output,
        costUsd,
        durationMs,
        modelName,
        inputTokens,
        outputTokens,
      };
    } catch (error) {
      const reason = LLMVisualAnalyzer.failureReason(abortSignal);
      const message = error instanceof Error ? error.message : String(error);
      const billed = error instanceof LLMCallError ? error.billedUsage : [];
      const { costUsd, inputTokens, outputTokens } = this.price(billed);

      this.logger.warn(
        `[LLMVisualAnalyzer] Page ${image.pageNumber} analysis failed (${reason}): ${message}`,
      );

      return {
        success: false,
        reason,
        error: message,
        costUsd,
        durationMs: Date.now() - startedAt,
        modelName: billed.at(-1)?.modelName ?? getModelName(this.options.model),
        inputTokens,
        outputTokens,
      };
    }
  }

  /**
   * Sums the cost of every model tried. Models without a pricing entry are
   * charged the flat per-call cost when they consumed tokens or answered.
   */
  private price(
    billed: readonly ExtendedTokenUsage[],
    answered?: ExtendedTokenUsage,
  ): BilledCost {
    const flatCost =
      this.options.costPerCall ?? BUDGET_LEDGER.DEFAULT_COST_PER_CALL;
    return billed.reduce<BilledCost>(
      (total, usage) => {
        const cost =
          calculateCost(usage.modelName, usage.inputTokens, usage.outputTokens) ??
          (usage.totalTokens > 0 || usage === answered ? flatCost : 0);
        return {
          costUsd: total.costUsd + cost,
          inputTokens: total.inputTokens + usage.inputTokens,
          outputTokens: total.outputTokens + usage.outputTokens,
        };
      },
      { costUsd: 0, inputTokens: 0, outputTokens: 0 },
    );
  }

  private static failureReason(signal?: AbortSignal): AnalysisFailureReason {
    if (!signal?.aborted) return 'api-error';
    const reason: unknown = signal.reason;
    return reason instanceof Error && reason.name === 'TimeoutError'
      ? 'timeout'
      : 'aborted';
  }
}
