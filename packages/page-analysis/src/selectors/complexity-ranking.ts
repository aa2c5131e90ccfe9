import type { BudgetStatusTier, ComplexityScore } from '@pagewise/model';

import { PAGE_SELECTOR } from '../config/constants';

const { COMPLEXITY } = PAGE_SELECTOR;

/** A page as complexity mode sees it */
export interface ComplexityCandidate {
  pageNumber: number;
  /** Value score in [0, 1] */
  value: number;
  admitted: boolean;
  highPriority: boolean;
}

function isOpeningPage(pageNumber: number): boolean {
  return pageNumber <= COMPLEXITY.OPENING_PAGES;
}

/**
 * Positional priority: opening slides first, closing slides next
 */
export function pagePriority(pageNumber: number, totalPages: number): number {
  if (isOpeningPage(pageNumber)) return COMPLEXITY.PRIORITY_OPENING;
  if (pageNumber >= totalPages - COMPLEXITY.CLOSING_PAGES) {
    return COMPLEXITY.PRIORITY_CLOSING;
  }
  return COMPLEXITY.PRIORITY_MIDDLE;
}

/**
 * How much a vision call on this page is worth, from its complexity,
 * whether it carries images or drawings, and whether it opens the deck.
 */
export function pageValueScore(complexity: ComplexityScore): number {
  let value = complexity.score * COMPLEXITY.SCORE_WEIGHT;
  if (complexity.subScores.image > 0) value += COMPLEXITY.IMAGE_BONUS;
  if (complexity.subScores.drawing > 0) value += COMPLEXITY.DRAWING_BONUS;
  if (isOpeningPage(complexity.pageNumber)) value += COMPLEXITY.OPENING_BONUS;
  return Math.min(value, 1);
}

export function isHighPriority(complexity: ComplexityScore): boolean {
  return (
    complexity.score >= COMPLEXITY.HIGH_PRIORITY_SCORE ||
    (complexity.subScores.image > 0 &&
      complexity.score >= COMPLEXITY.HIGH_PRIORITY_IMAGE_SCORE)
  );
}

/**
 * Whether the budget tier lets this page through.
 *
 * NORMAL admits pages that require visual analysis; WARNING admits
 * complex or well-placed pages; CRITICAL only very complex opening pages.
 * Opening pages of moderate complexity are admitted in every tier.
 */
export function isAdmitted(
  complexity: ComplexityScore,
  totalPages: number,
  tier: BudgetStatusTier,
): boolean {
  const { score, pageNumber } = complexity;
  return (
    admittedByTier(complexity, pagePriority(pageNumber, totalPages), tier) ||
    (isOpeningPage(pageNumber) && score >= COMPLEXITY.OPENING_ADMIT_SCORE)
  );
}

function admittedByTier(
  complexity: ComplexityScore,
  priority: number,
  tier: BudgetStatusTier,
): boolean {
  switch (tier) {
    case 'CRITICAL':
      return (
        complexity.score >= COMPLEXITY.CRITICAL_SCORE &&
        priority >= COMPLEXITY.CRITICAL_PRIORITY
      );
    case 'WARNING':
      return (
        complexity.score >= COMPLEXITY.WARNING_SCORE ||
        priority >= COMPLEXITY.WARNING_PRIORITY
      );
    case 'NORMAL':
      return complexity.requiresVisualAnalysis;
  }
}

/**
 * Complexity candidates in selection order: admitted high-priority pages,
 * then other admitted pages, then the rest. Each group is ordered by value
 * score, ties by page number.
 */
export function rankByComplexity(
  pages: readonly ComplexityScore[],
  totalPages: number,
  tier: BudgetStatusTier,
): ComplexityCandidate[] {
  const group = (candidate: ComplexityCandidate): number =>
    candidate.highPriority ? 0 : candidate.admitted ? 1 : 2;

  return pages
    .map((complexity) => {
      const admitted = isAdmitted(complexity, totalPages, tier);
      return {
        pageNumber: complexity.pageNumber,
        value: pageValueScore(complexity),
        admitted,
        highPriority: admitted && isHighPriority(complexity),
      };
    })
    .sort(
      (a, b) =>
        group(a) - group(b) ||
        b.value - a.value ||
        a.pageNumber - b.pageNumber,
    );
}
