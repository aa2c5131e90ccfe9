import type { PageVisualAnalysis, RenderedPageImage } from '@pagewise/model';

import { LLMCallError, LLMCaller } from '@pagewise/shared';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import type { VisualAnalysisRequest } from '../types/collaborators';

import { LLMVisualAnalyzer } from './llm-visual-analyzer';

vi.mock('@pagewise/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@pagewise/shared')>()),
  LLMCaller: {
    callVision: vi.fn(),
  },
}));

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const mockCallVision = LLMCaller.callVision as Mock;

const analysis: PageVisualAnalysis = {
  pageType: 'financial projections',
  visualElements: ['bar chart'],
  dataPoints: [{ label: 'ARR', value: '$2.4M', context: 'bar chart, 2025' }],
  insights: ['ARR tripled year over year'],
  layoutSummary: 'Title above a full-width bar chart',
  slideReferences: ['Slide 12: ARR reached $2.4M'],
};

const image: RenderedPageImage = {
  pageNumber: 12,
  data: new Uint8Array([1, 2, 3]),
  mimeType: 'image/png',
  width: 1600,
  height: 900,
  sizeKb: 180.25,
  dpi: 150,
};

function request(abortSignal?: AbortSignal): VisualAnalysisRequest {
  return {
    image,
    prompt: 'Analyze this slide',
    context: {
      pdfPath: '/decks/acme.pdf',
      documentType: 'Pitch Deck',
      totalPages: 18,
      pageNumber: 12,
      label: 'financials',
      keywordsFound: ['revenue'],
    },
    abortSignal,
  };
}

function usage(
  modelName: string,
  inputTokens: number,
  outputTokens: number,
  model: 'primary' | 'fallback' = 'primary',
) {
  return {
    component: 'LLMVisualAnalyzer',
    phase: 'page-analysis',
    model,
    modelName,
    inputTokens,
    outputTokens,
    totalTokens: inputTokens + outputTokens,
  };
}

function callResult(modelName: string, usedFallback = false) {
  const answered = usage(
    modelName,
    2000,
    400,
    usedFallback ? 'fallback' : 'primary',
  );
  return {
    output: analysis,
    usage: answered,
    billedUsage: [answered],
    usedFallback,
  };
}

describe('LLMVisualAnalyzer', () => {
  let analyzer: LLMVisualAnalyzer;

  beforeEach(() => {
    analyzer = new LLMVisualAnalyzer(mockLogger, {
      model: 'openai/gpt-5-mini',
      costPerCall: 0.01,
    });
  });

  test('sends the prompt and the image as a data URL', async () => {
    mockCallVision.mockResolvedValue(callResult('openai/gpt-5-mini'));
    const controller = new AbortController();

    await analyzer.analyze(request(controller.signal));

    expect(mockCallVision).toHaveBeenCalledWith(
      expect.objectContaining({
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: 'Analyze this slide' },
              { type: 'image', image: 'data:image/png;base64,AQID' },
            ],
          },
        ],
        primaryModel: 'openai/gpt-5-mini',
        fallbackModel: undefined,
        maxRetries: 1,
        temperature: 0.1,
        abortSignal: controller.signal,
        component: 'LLMVisualAnalyzer',
        phase: 'page-analysis',
      }),
    );
  });

  test('prices successful calls from token usage', async () => {
    mockCallVision.mockResolvedValue(callResult('openai/gpt-5-mini'));

    const outcome = await analyzer.analyze(request());

    expect(outcome).toEqual({
      success: true,
      analysis,
      costUsd: expect.closeTo(0.0013, 10),
      durationMs: expect.any(Number),
      modelName: 'openai/gpt-5-mini',
      inputTokens: 2000,
      outputTokens: 400,
    });
  });

  test('charges the flat per-call cost for unpriced models', async () => {
    mockCallVision.mockResolvedValue(callResult('acme/vision-1', true));

    const outcome = await analyzer.analyze(request());

    expect(outcome.success).toBe(true);
    expect(outcome.costUsd).toBe(0.01);
    expect(outcome.modelName).toBe('acme/vision-1');
    expect(mockLogger.debug).toHaveBeenCalledWith(
      expect.stringMatching(
        /^\[LLMVisualAnalyzer\] Page 12 analyzed by acme\/vision-1 \(fallback\) in \d+ms, \$0\.0100$/,
      ),
    );
  });

  test('uses the default per-call cost when none is configured', async () => {
    mockCallVision.mockResolvedValue(callResult('acme/vision-1'));
    const defaults = new LLMVisualAnalyzer(mockLogger, {
      model: 'acme/vision-1',
    });

    const outcome = await defaults.analyze(request());

    expect(outcome.costUsd).toBe(0.00765);
  });

  test('passes model options through', async () => {
    mockCallVision.mockResolvedValue(callResult('openai/gpt-5-mini'));
    const tuned = new LLMVisualAnalyzer(mockLogger, {
      model: 'openai/gpt-5-mini',
      fallbackModel: 'google/gemini-2.5-flash',
      maxRetries: 3,
      temperature: 0,
    });

    await tuned.analyze(request());

    expect(mockCallVision).toHaveBeenCalledWith(
      expect.objectContaining({
        fallbackModel: 'google/gemini-2.5-flash',
        maxRetries: 3,
        temperature: 0,
      }),
    );
  });

  test('reports API errors as failed outcomes', async () => {
    mockCallVision.mockRejectedValue(new Error('Rate limit exceeded'));

    const outcome = await analyzer.analyze(request());

    expect(outcome).toEqual({
      success: false,
      reason: 'api-error',
      error: 'Rate limit exceeded',
      costUsd: 0,
      durationMs: expect.any(Number),
      modelName: 'openai/gpt-5-mini',
      inputTokens: 0,
      outputTokens: 0,
    });
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[LLMVisualAnalyzer] Page 12 analysis failed (api-error): Rate limit exceeded',
    );
  });

  test('reports timeouts', async () => {
    const controller = new AbortController();
    controller.abort(new DOMException('The operation timed out', 'TimeoutError'));
    mockCallVision.mockRejectedValue(controller.signal.reason);

    const outcome = await analyzer.analyze(request(controller.signal));

    expect(outcome).toMatchObject({ success: false, reason: 'timeout' });
  });

  test('reports caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    mockCallVision.mockRejectedValue(controller.signal.reason);

    const outcome = await analyzer.analyze(request(controller.signal));

    expect(outcome).toMatchObject({ success: false, reason: 'aborted' });
  });

  test('prices every failed attempt of a failed call', async () => {
    mockCallVision.mockRejectedValue(
      new LLMCallError('No object generated', [
        usage('gpt-4o', 300_000, 30_000),
      ]),
    );

    const outcome = await analyzer.analyze(request());

    expect(outcome).toEqual({
      success: false,
      reason: 'api-error',
      error: 'No object generated',
      costUsd: expect.closeTo(1.05, 10),
      durationMs: expect.any(Number),
      modelName: 'gpt-4o',
      inputTokens: 300_000,
      outputTokens: 30_000,
    });
  });

  test('prices the failed attempts before a success', async () => {
    const answered = usage('gpt-4o', 300_000, 30_000);
    mockCallVision.mockResolvedValue({
      output: analysis,
      usage: answered,
      billedUsage: [answered],
      usedFallback: false,
    });

    const outcome = await analyzer.analyze(request());

    expect(outcome).toMatchObject({
      success: true,
      costUsd: expect.closeTo(1.05, 10),
      inputTokens: 300_000,
      outputTokens: 30_000,
    });
  });

  test('adds the primary model cost to a fallback answer', async () => {
    const answered = usage('acme/vision-1', 2000, 400, 'fallback');
    mockCallVision.mockResolvedValue({
      output: analysis,
      usage: answered,
      billedUsage: [usage('gpt-4o', 100_000, 10_000), answered],
      usedFallback: true,
    });

    const outcome = await analyzer.analyze(request());

    expect(outcome).toMatchObject({
      success: true,
      costUsd: expect.closeTo(0.36, 10),
      modelName: 'acme/vision-1',
      inputTokens: 102_000,
      outputTokens: 10_400,
    });
  });

  test('charges nothing for unpriced models that consumed no tokens', async () => {
    mockCallVision.mockRejectedValue(
      new LLMCallError('overloaded', [usage('acme/vision-1', 0, 0)]),
    );

    const outcome = await analyzer.analyze(request());

    expect(outcome).toMatchObject({
      success: false,
      costUsd: 0,
      modelName: 'acme/vision-1',
    });
  });

  test('stringifies non-error rejections', async () => {
    mockCallVision.mockRejectedValue('socket hang up');

    const outcome = await analyzer.analyze(request());

    expect(outcome).toMatchObject({
      success: false,
      reason: 'api-error',
      error: 'socket hang up',
    });
  });
});
