import { describe, expect, test } from 'vitest';

import { ConfigurationError } from '../errors/configuration-error';
import { loadPageAnalysisConfig } from './page-analysis-config';

describe('loadPageAnalysisConfig', () => {
  test('returns defaults for an empty environment', () => {
    expect(loadPageAnalysisConfig({})).toEqual({
      visionEnabled: true,
      costPerCall: 0.00765,
      budget: {
        dailyLimit: 5,
        weeklyLimit: 25,
        monthlyLimit: 100,
        warningThreshold: 0.8,
        stopThreshold: 0.95,
      },
      complexityThreshold: 0.6,
      selection: {
        maxPages: 7,
        minPages: 3,
        categoryCaps: {
          financials: 3,
          competition: 3,
          market: 2,
          traction: 2,
          team: 1,
        },
      },
      rendering: { dpi: 150, maxDimension: 2048 },
      concurrency: 3,
      callTimeoutMs: 30_000,
      logLevel: 'info',
    });
  });

  test('reads and coerces environment variables', () => {
    const config = loadPageAnalysisConfig({
      VISION_ENABLED: 'no',
      VISION_COST_PER_CALL: '0.01',
      VISION_DAILY_BUDGET: '2.5',
      VISION_MAX_PAGES: '10',
      VISION_MIN_PAGES: '4',
      VISION_MAX_PAGES_TEAM: '0',
      VISION_IMAGE_DPI: '200',
      VISION_CONCURRENCY: '5',
      LOG_LEVEL: 'debug',
    });

    expect(config.visionEnabled).toBe(false);
    expect(config.costPerCall).toBe(0.01);
    expect(config.budget.dailyLimit).toBe(2.5);
    expect(config.selection).toEqual({
      maxPages: 10,
      minPages: 4,
      categoryCaps: {
        financials: 3,
        competition: 3,
        market: 2,
        traction: 2,
        team: 0,
      },
    });
    expect(config.rendering.dpi).toBe(200);
    expect(config.concurrency).toBe(5);
    expect(config.logLevel).toBe('debug');
  });

  test('treats blank variables as unset', () => {
    const config = loadPageAnalysisConfig({
      VISION_ENABLED: '  ',
      VISION_MAX_PAGES: '',
    });

    expect(config.visionEnabled).toBe(true);
    expect(config.selection.maxPages).toBe(7);
  });

  test.each<[string, boolean]>([
    ['true', true],
    ['1', true],
    ['ON', true],
    ['false', false],
    ['0', false],
    ['off', false],
  ])('parses VISION_ENABLED=%s', (value, expected) => {
    expect(loadPageAnalysisConfig({ VISION_ENABLED: value }).visionEnabled).toBe(
      expected,
    );
  });

  test('rejects unknown boolean spellings', () => {
    expect(() => loadPageAnalysisConfig({ VISION_ENABLED: 'maybe' })).toThrow(
      'Invalid page analysis configuration (1 issue)',
    );
  });

  test('lists every invalid variable', () => {
    let caught: unknown;
    try {
      loadPageAnalysisConfig({
        VISION_MAX_PAGES: 'lots',
        VISION_DAILY_BUDGET: '-1',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const error = caught as ConfigurationError;
    expect(error.message).toBe('Invalid page analysis configuration (2 issues)');
    expect(error.issues.map((issue) => issue.split(':')[0]).sort()).toEqual([
      'VISION_DAILY_BUDGET',
      'VISION_MAX_PAGES',
    ]);
  });

  test('rejects a minimum above the maximum', () => {
    let caught: unknown;
    try {
      loadPageAnalysisConfig({ VISION_MAX_PAGES: '2', VISION_MIN_PAGES: '3' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect((caught as ConfigurationError).issues).toEqual([
      'VISION_MIN_PAGES: must not exceed VISION_MAX_PAGES (2)',
    ]);
  });

  test('rejects a warning threshold at or above the stop threshold', () => {
    expect(() =>
      loadPageAnalysisConfig({
        VISION_WARNING_THRESHOLD: '0.9',
        VISION_STOP_THRESHOLD: '0.9',
      }),
    ).toThrow(ConfigurationError);
  });
});
