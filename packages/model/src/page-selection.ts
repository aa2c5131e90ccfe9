import type { BudgetStatusTier } from './budget';
import type { SelectionLabel } from './category-score';

/** How pages were chosen */
export type SelectionMode = 'category' | 'complexity' | 'positional';

/** Positional template used, or 'all' when every page fit */
export type PositionalTemplate = 'short' | 'standard' | 'long' | 'all';

/**
 * How complexity mode admitted pages.
 */
export interface ComplexityGatingAudit {
  /** Budget tier whose admission rules applied */
  tier: BudgetStatusTier;
  /** Pages that passed the tier's admission rules */
  admittedCount: number;
  /** Admitted pages ranked ahead of the rest (very complex, or images with moderate complexity) */
  highPriorityPages: number[];
}

/**
 * Audit record produced with every selection.
 */
export interface SelectionAudit {
  /** Pages in the document */
  totalPages: number;

  /** Pages selected */
  selectedCount: number;

  /** Wall-clock selection time in milliseconds */
  elapsedMs: number;

  /** Selected page count per label */
  breakdown: Partial<Record<SelectionLabel, number>>;

  /** Template used by positional selection (absent in the other modes) */
  template?: PositionalTemplate;

  /** Admission details (complexity mode only) */
  gating?: ComplexityGatingAudit;

  /** selectedCount × cost per page */
  estimatedCostUsd: number;

  /** totalPages × cost per page */
  fullProcessingCostUsd: number;

  /** fullProcessingCostUsd − estimatedCostUsd */
  estimatedSavingsUsd: number;

  /** Savings as a percentage of the full processing cost (0 for empty documents) */
  savingsPct: number;
}

/**
 * Outcome of page selection.
 *
 * Guarantees: page numbers are unique and within [1, totalPages]; the count
 * never exceeds the maximum; it reaches the minimum whenever the document
 * has that many pages; documents no longer than the maximum are selected
 * in full.
 */
export interface SelectionResult {
  mode: SelectionMode;

  totalPages: number;

  /** Label → pages in the order they were picked */
  selections: Partial<Record<SelectionLabel, number[]>>;

  audit: SelectionAudit;
}
