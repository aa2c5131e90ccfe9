/** Spending windows tracked by the budget ledger */
export type BudgetWindow = 'daily' | 'weekly' | 'monthly';

/** Budget health derived from daily utilization */
export type BudgetStatusTier = 'NORMAL' | 'WARNING' | 'CRITICAL';

/**
 * One recorded analyzer call. Immutable once recorded.
 */
export interface SpendRecord {
  /** Milliseconds since the epoch */
  readonly timestamp: number;
  readonly pageNumber: number;
  /** Actual cost incurred in USD (0 when the call failed before billing) */
  readonly costUsd: number;
  readonly imageSizeKb: number;
  readonly durationMs: number;
  readonly success: boolean;
  readonly modelName: string;
  /** Document the call belonged to, when known */
  readonly documentId?: string;
}

/**
 * Snapshot of one window, derived from the ledger on every query.
 */
export interface BudgetWindowStatus {
  window: BudgetWindow;
  spent: number;
  limit: number;
  /** Estimated cost held for admitted calls that are not recorded yet */
  reserved: number;
  /** max(limit − spent − reserved, 0) */
  remaining: number;
  /** spent / limit; 1 when the limit is 0 */
  utilization: number;
  status: BudgetStatusTier;
}

/**
 * Estimated spend held back for an admitted batch until its calls are
 * recorded or the batch ends.
 */
export interface BudgetReservation {
  readonly id: number;
  readonly pageCount: number;
  readonly costPerPage: number;
}

/**
 * Answer to "can N more pages be afforded right now".
 *
 * The ledger only reports; callers decide how to shrink their candidates.
 */
export interface BudgetCheck {
  candidatePageCount: number;
  costPerPage: number;
  /** candidatePageCount × costPerPage */
  estimatedCost: number;
  windows: Record<BudgetWindow, BudgetWindowStatus>;
  /** Estimated cost fits within the remaining budget of every window */
  canAffordAllPages: boolean;
  /**
   * candidatePageCount when affordable, otherwise
   * floor(remaining / costPerPage) on the most restrictive window
   */
  maxAffordablePages: number;
  /** Window with the least remaining budget (daily wins ties, then weekly) */
  limitingWindow: BudgetWindow;
  /** Tier of the daily window */
  status: BudgetStatusTier;
  /** Operator-facing advice */
  recommendations: string[];
}

/**
 * Spending summary for one window.
 */
export interface CostSummary {
  window: BudgetWindow;
  totalSpent: number;
  budget: number;
  remaining: number;
  utilizationPct: number;
  status: BudgetStatusTier;
  calls: {
    total: number;
    successful: number;
    failed: number;
  };
  /** 0 when there were no calls */
  averageCostPerCall: number;
  efficiency: {
    averageDurationMs: number;
    averageImageSizeKb: number;
    successRatePct: number;
  };
}

/**
 * Running totals for one local calendar day.
 */
export interface DailyCostSummary {
  /** Local date as YYYY-MM-DD */
  date: string;
  calls: number;
  successful: number;
  failed: number;
  totalCost: number;
  averageCostPerCall: number;
  /** totalCost against the daily limit, in percent */
  utilizationPct: number;
}
