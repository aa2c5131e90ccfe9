/**
 * Tuning constants for ComplexityScorer
 */
export const COMPLEXITY_SCORER = {
  /**
   * Weights of the five sub-scores; they sum to 1
   */
  WEIGHTS: {
    image: 0.35,
    drawing: 0.25,
    layout: 0.2,
    color: 0.15,
    textComplement: 0.05,
  },

  /** Sub-score added per embedded image */
  IMAGE_UNIT: 0.3,

  /** Sub-score added per drawing primitive */
  DRAWING_UNIT: 0.1,

  /** Layout sub-score when the page has more than LAYOUT_BLOCK_THRESHOLD blocks */
  LAYOUT_SCORE: 0.4,

  LAYOUT_BLOCK_THRESHOLD: 5,

  /** Color count at which the color sub-score saturates */
  COLOR_SATURATION: 50,

  /** Drawings needed (strictly more than) to count as a chart for the boost */
  BOOST_DRAWING_THRESHOLD: 3,

  FINANCIAL_BOOST: 0.2,

  /** Default score at or above which a page needs visual analysis */
  DEFAULT_THRESHOLD: 0.6,

  /** Score assigned when a page profile could not be read */
  FALLBACK_SCORE: 0.3,

  /** Distribution band edges: high > HIGH, low < LOW */
  DISTRIBUTION_HIGH: 0.7,
  DISTRIBUTION_LOW: 0.4,

  /**
   * Vocabulary that marks a page as financially relevant
   */
  FINANCIAL_KEYWORDS: [
    'revenue',
    'profit',
    'growth',
    'market',
    'financial',
    'investment',
    'funding',
    'valuation',
    'metrics',
  ],
} as const;

/**
 * Constants for CategoryScorer
 */
export const CATEGORY_SCORER = {
  /** weightedScore = matches × (TIER_BASE − tier) + min(matches × DENSITY_FACTOR, DENSITY_CAP) */
  TIER_BASE: 4,
  DENSITY_FACTOR: 0.1,
  DENSITY_CAP: 0.5,

  /** Characters of page text kept for previews */
  PREVIEW_LENGTH: 200,
} as const;

/**
 * Constants for PageSelector
 */
export const PAGE_SELECTOR = {
  DEFAULT_MAX_PAGES: 7,
  DEFAULT_MIN_PAGES: 3,

  /** Documents with at most this many pages use the short template */
  SHORT_DOCUMENT_MAX: 20,

  /** Documents with at least this many pages use the long template */
  LONG_DOCUMENT_MIN: 35,

  /**
   * Typical positions of key slides in pitch decks
   */
  TEMPLATES: {
    short: [3, 6, 9, 12, 15],
    standard: [4, 8, 12, 16, 18, 19, 20],
    long: [4, 8, 12, 16, 20, 25, 30],
  },

  /**
   * Complexity mode: value scoring and budget-tier admission
   */
  COMPLEXITY: {
    /** Pages at or below this number count as opening slides */
    OPENING_PAGES: 3,
    /** Pages within this distance of the last page count as closing slides */
    CLOSING_PAGES: 2,

    PRIORITY_OPENING: 0.9,
    PRIORITY_CLOSING: 0.7,
    PRIORITY_MIDDLE: 0.5,

    /** value = min(score × SCORE_WEIGHT + bonuses, 1) */
    SCORE_WEIGHT: 0.6,
    IMAGE_BONUS: 0.2,
    DRAWING_BONUS: 0.15,
    OPENING_BONUS: 0.1,

    /** High priority: score ≥ HIGH_PRIORITY_SCORE, or images and score ≥ HIGH_PRIORITY_IMAGE_SCORE */
    HIGH_PRIORITY_SCORE: 0.8,
    HIGH_PRIORITY_IMAGE_SCORE: 0.6,

    /** CRITICAL tier admits score ≥ CRITICAL_SCORE with priority ≥ CRITICAL_PRIORITY */
    CRITICAL_SCORE: 0.9,
    CRITICAL_PRIORITY: 0.8,

    /** WARNING tier admits score ≥ WARNING_SCORE or priority ≥ WARNING_PRIORITY */
    WARNING_SCORE: 0.7,
    WARNING_PRIORITY: 0.7,

    /** Opening slides at or above this score are admitted in every tier */
    OPENING_ADMIT_SCORE: 0.5,
  },
} as const;

/**
 * Defaults for BudgetLedger
 */
export const BUDGET_LEDGER = {
  /** Estimated USD cost of one high-detail page analysis */
  DEFAULT_COST_PER_CALL: 0.00765,

  DEFAULT_DAILY_LIMIT: 5,
  DEFAULT_WEEKLY_LIMIT: 25,
  DEFAULT_MONTHLY_LIMIT: 100,

  DEFAULT_WARNING_THRESHOLD: 0.8,
  DEFAULT_STOP_THRESHOLD: 0.95,

  WEEK_MS: 7 * 24 * 60 * 60 * 1000,
  MONTH_MS: 30 * 24 * 60 * 60 * 1000,

  /** Tolerance for floating-point division when counting affordable pages */
  AFFORDABILITY_EPSILON: 1e-9,
} as const;

/**
 * Defaults for page rendering
 */
export const PAGE_RENDERING = {
  DEFAULT_DPI: 150,

  /** Longest rendered edge in pixels */
  DEFAULT_MAX_DIMENSION: 2048,

  /** Density used when sampling colors from a page */
  COLOR_SAMPLE_DPI: 72,

  /** Upper bound reported for color diversity */
  MAX_COLOR_DIVERSITY: 256,
} as const;

/**
 * Defaults for PageAnalysisPipeline
 */
export const PAGE_ANALYSIS_PIPELINE = {
  DEFAULT_CONCURRENCY: 3,

  /** Per-call analyzer timeout */
  DEFAULT_CALL_TIMEOUT_MS: 30_000,

  /** Concurrency for reading page profiles during scanning */
  SCAN_CONCURRENCY: 4,

  /** Transport retries handed to the AI SDK per analyzer call */
  DEFAULT_MAX_RETRIES: 1,
} as const;
