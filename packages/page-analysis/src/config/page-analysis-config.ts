import type { LogLevel } from '@pagewise/logger';
import type { BusinessCategory } from '@pagewise/model';

import { z } from 'zod';

import { ConfigurationError } from '../errors/configuration-error';
import { DEFAULT_CATEGORY_CAPS } from './categories';
import {
  BUDGET_LEDGER,
  COMPLEXITY_SCORER,
  PAGE_ANALYSIS_PIPELINE,
  PAGE_RENDERING,
  PAGE_SELECTOR,
} from './constants';

/**
 * Resolved configuration for the page analysis engine
 */
export interface PageAnalysisConfig {
  /** When false the pipeline skips visual analysis and requests text-only fallback */
  visionEnabled: boolean;
  /** Estimated USD cost of one page analysis */
  costPerCall: number;
  budget: {
    dailyLimit: number;
    weeklyLimit: number;
    monthlyLimit: number;
    warningThreshold: number;
    stopThreshold: number;
  };
  complexityThreshold: number;
  selection: {
    maxPages: number;
    minPages: number;
    categoryCaps: Record<BusinessCategory, number>;
  };
  rendering: {
    dpi: number;
    maxDimension: number;
  };
  concurrency: number;
  callTimeoutMs: number;
  logLevel: LogLevel;
}

/**
 * Boolean coercion that understands "true"/"false"/"1"/"0"/"yes"/"no"
 */
const booleanString = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') return value;
    const lower = value.toLowerCase().trim();
    if (['true', '1', 'yes', 'on'].includes(lower)) return true;
    if (['false', '0', 'no', 'off'].includes(lower)) return false;
    ctx.addIssue({ code: 'custom', message: `Invalid boolean "${value}"` });
    return z.NEVER;
  });

const money = (fallback: number) => z.coerce.number().min(0).default(fallback);
const ratio = (fallback: number) =>
  z.coerce.number().min(0).max(1).default(fallback);
const count = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z
  .object({
    VISION_ENABLED: booleanString.default(true),
    VISION_COST_PER_CALL: z.coerce
      .number()
      .positive()
      .default(BUDGET_LEDGER.DEFAULT_COST_PER_CALL),
    VISION_DAILY_BUDGET: money(BUDGET_LEDGER.DEFAULT_DAILY_LIMIT),
    VISION_WEEKLY_BUDGET: money(BUDGET_LEDGER.DEFAULT_WEEKLY_LIMIT),
    VISION_MONTHLY_BUDGET: money(BUDGET_LEDGER.DEFAULT_MONTHLY_LIMIT),
    VISION_WARNING_THRESHOLD: ratio(BUDGET_LEDGER.DEFAULT_WARNING_THRESHOLD),
    VISION_STOP_THRESHOLD: ratio(BUDGET_LEDGER.DEFAULT_STOP_THRESHOLD),
    VISION_COMPLEXITY_THRESHOLD: ratio(COMPLEXITY_SCORER.DEFAULT_THRESHOLD),
    VISION_MAX_PAGES: count(PAGE_SELECTOR.DEFAULT_MAX_PAGES, 1),
    VISION_MIN_PAGES: count(PAGE_SELECTOR.DEFAULT_MIN_PAGES),
    VISION_MAX_PAGES_FINANCIALS: count(DEFAULT_CATEGORY_CAPS.financials),
    VISION_MAX_PAGES_COMPETITION: count(DEFAULT_CATEGORY_CAPS.competition),
    VISION_MAX_PAGES_MARKET: count(DEFAULT_CATEGORY_CAPS.market),
    VISION_MAX_PAGES_TRACTION: count(DEFAULT_CATEGORY_CAPS.traction),
    VISION_MAX_PAGES_TEAM: count(DEFAULT_CATEGORY_CAPS.team),
    VISION_IMAGE_DPI: count(PAGE_RENDERING.DEFAULT_DPI, 36),
    VISION_MAX_IMAGE_SIZE: count(PAGE_RENDERING.DEFAULT_MAX_DIMENSION, 256),
    VISION_CONCURRENCY: count(PAGE_ANALYSIS_PIPELINE.DEFAULT_CONCURRENCY, 1),
    VISION_CALL_TIMEOUT_MS: count(
      PAGE_ANALYSIS_PIPELINE.DEFAULT_CALL_TIMEOUT_MS,
      1,
    ),
    LOG_LEVEL: z
      .enum(['debug', 'info', 'warn', 'error', 'silent'])
      .default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.VISION_MIN_PAGES > env.VISION_MAX_PAGES) {
      ctx.addIssue({
        code: 'custom',
        path: ['VISION_MIN_PAGES'],
        message: `must not exceed VISION_MAX_PAGES (${env.VISION_MAX_PAGES})`,
      });
    }
    if (env.VISION_WARNING_THRESHOLD >= env.VISION_STOP_THRESHOLD) {
      ctx.addIssue({
        code: 'custom',
        path: ['VISION_WARNING_THRESHOLD'],
        message: `must be below VISION_STOP_THRESHOLD (${env.VISION_STOP_THRESHOLD})`,
      });
    }
  });

const ENV_KEYS = Object.keys(envSchema.shape);

/**
 * Load configuration from environment variables.
 *
 * Unset and blank variables take their defaults.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadPageAnalysisConfig(
  env: Record<string, string | undefined> = process.env,
): PageAnalysisConfig {
  const raw: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) raw[key] = value;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid page analysis configuration (${issues.length} issue${issues.length === 1 ? '' : 's'})`,
      issues,
      { cause: parsed.error },
    );
  }

  const e = parsed.data;
  return {
    visionEnabled: e.VISION_ENABLED,
    costPerCall: e.VISION_COST_PER_CALL,
    budget: {
      dailyLimit: e.VISION_DAILY_BUDGET,
      weeklyLimit: e.VISION_WEEKLY_BUDGET,
      monthlyLimit: e.VISION_MONTHLY_BUDGET,
      warningThreshold: e.VISION_WARNING_THRESHOLD,
      stopThreshold: e.VISION_STOP_THRESHOLD,
    },
    complexityThreshold: e.VISION_COMPLEXITY_THRESHOLD,
    selection: {
      maxPages: e.VISION_MAX_PAGES,
      minPages: e.VISION_MIN_PAGES,
      categoryCaps: {
        financials: e.VISION_MAX_PAGES_FINANCIALS,
        competition: e.VISION_MAX_PAGES_COMPETITION,
        market: e.VISION_MAX_PAGES_MARKET,
        traction: e.VISION_MAX_PAGES_TRACTION,
        team: e.VISION_MAX_PAGES_TEAM,
      },
    },
    rendering: {
      dpi: e.VISION_IMAGE_DPI,
      maxDimension: e.VISION_MAX_IMAGE_SIZE,
    },
    concurrency: e.VISION_CONCURRENCY,
    callTimeoutMs: e.VISION_CALL_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
  };
}
