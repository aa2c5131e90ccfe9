import type { LoggerMethods } from '@pagewise/logger';
import type {
  BudgetStatusTier,
  BusinessCategory,
  CategoryScore,
  ComplexityGatingAudit,
  ComplexityScore,
  PositionalTemplate,
  SelectionAudit,
  SelectionLabel,
  SelectionMode,
  SelectionResult,
} from '@pagewise/model';

import {
  BUSINESS_CATEGORIES,
  CATEGORIES_BY_TIER,
  DEFAULT_CATEGORY_CAPS,
} from '../config/categories';
import { BUDGET_LEDGER, PAGE_SELECTOR } from '../config/constants';
import { ContractViolationError } from '../errors/contract-violation-error';
import { rankByComplexity } from './complexity-ranking';

/** Options for PageSelector.select */
export interface PageSelectorOptions {
  /** Upper bound on selected pages (default: 7) */
  maxPages?: number;
  /** Lower bound on selected pages when the document is long enough (default: 3) */
  minPages?: number;
  /** Per-category page caps, merged over the defaults */
  categoryCaps?: Partial<Record<BusinessCategory, number>>;
  /** Per-page cost used for the audit estimate (default: 0.00765) */
  costPerPage?: number;
}

/** Scored input for content-based selection, or a page count for positional selection */
export type SelectionInput =
  | { kind: 'category'; totalPages: number; pages: readonly CategoryScore[] }
  | {
      kind: 'complexity';
      totalPages: number;
      pages: readonly ComplexityScore[];
      /** Tier whose admission rules apply (default: 'NORMAL') */
      budgetStatus?: BudgetStatusTier;
    }
  | { kind: 'positional'; totalPages: number };

/** A candidate in selection order */
interface RankedCandidate {
  pageNumber: number;
  label: SelectionLabel;
  /** 'primary' entries fill toward maxPages, 'fill' entries only toward the fill target */
  pass: 'primary' | 'fill';
}

/** Ranked candidates of one input, with the gating details complexity mode adds */
interface Ranking {
  candidates: RankedCandidate[];
  gating?: ComplexityGatingAudit;
}

/** Accumulates a selection while keeping page numbers unique */
class SelectionBuilder {
  readonly selections: Partial<Record<SelectionLabel, number[]>> = {};
  private readonly selected = new Set<number>();

  get size(): number {
    return this.selected.size;
  }

  has(pageNumber: number): boolean {
    return this.selected.has(pageNumber);
  }

  add(pageNumber: number, label: SelectionLabel): void {
    if (this.selected.has(pageNumber)) return;
    this.selected.add(pageNumber);
    (this.selections[label] ??= []).push(pageNumber);
  }

  /** Add unselected pages from `pages` until `target` is reached */
  fillFrom(pages: Iterable<number>, target: number): void {
    for (const page of pages) {
      if (this.size >= target) return;
      this.add(page, 'general');
    }
  }
}

const LABEL_ORDER: readonly SelectionLabel[] = [
  ...BUSINESS_CATEGORIES,
  'general',
];

function* ascendingPages(totalPages: number): Generator<number> {
  for (let page = 1; page <= totalPages; page++) yield page;
}

/**
 * Chooses which pages receive visual analysis.
 *
 * Category mode fills tier-1 categories first, then tier 2, then tier 3,
 * each up to its cap, and tops up to the minimum from the remaining
 * scored pages. Caps are strict: a top-up page whose category is already
 * full is filed under 'general'. Complexity mode ranks pages by value
 * score and fills toward the maximum only with pages the budget tier
 * admits; the rest can only top up to the minimum. Positional mode picks
 * typical key-slide positions for the document's length. Selection is
 * deterministic.
 */
export class PageSelector {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Select pages and log the audit trail.
   *
   * @throws ContractViolationError for impossible bounds or invalid page numbers
   */
  select(
    input: SelectionInput,
    options?: PageSelectorOptions,
  ): SelectionResult {
    const startedAt = performance.now();
    const maxPages = options?.maxPages ?? PAGE_SELECTOR.DEFAULT_MAX_PAGES;
    const minPages = options?.minPages ?? PAGE_SELECTOR.DEFAULT_MIN_PAGES;
    const costPerPage =
      options?.costPerPage ?? BUDGET_LEDGER.DEFAULT_COST_PER_CALL;
    const { totalPages } = input;

    PageSelector.validateBounds(totalPages, maxPages, minPages);
    const caps = PageSelector.resolveCaps(options?.categoryCaps);
    const fillTarget = totalPages <= maxPages ? totalPages : minPages;

    const builder = new SelectionBuilder();
    let mode: SelectionMode = 'positional';
    let template: PositionalTemplate | undefined;

    const { candidates: ranked, gating } = this.rankInput(input, caps);

    if (ranked.length > 0) {
      mode = input.kind === 'complexity' ? 'complexity' : 'category';
      for (const candidate of ranked) {
        const limit = candidate.pass === 'primary' ? maxPages : fillTarget;
        if (builder.size >= limit) continue;
        builder.add(candidate.pageNumber, candidate.label);
      }
      builder.fillFrom(
        PAGE_SELECTOR.TEMPLATES.standard.filter((page) => page <= totalPages),
        fillTarget,
      );
      builder.fillFrom(ascendingPages(totalPages), fillTarget);
    } else {
      template = this.selectByPosition(builder, totalPages, maxPages, minPages);
    }

    const result: SelectionResult = {
      mode,
      totalPages,
      selections: builder.selections,
      audit: PageSelector.buildAudit(
        builder,
        totalPages,
        costPerPage,
        performance.now() - startedAt,
        template,
        gating,
      ),
    };

    this.logAudit(result);
    return result;
  }

  /**
   * Scored pages in the order category mode would pick them: each category
   * block in tier order up to its cap, then the remaining scored pages by
   * total score. Unscored pages are not candidates.
   *
   * Truncating this list keeps the highest-priority pages, which is how
   * callers shrink a candidate set to what the budget allows.
   */
  rankCandidates(
    pages: readonly CategoryScore[],
    categoryCaps?: Partial<Record<BusinessCategory, number>>,
  ): number[] {
    return this.rank(pages, PageSelector.resolveCaps(categoryCaps)).map(
      (candidate) => candidate.pageNumber,
    );
  }

  /**
   * All selected pages in ascending order
   */
  static flatten(result: SelectionResult): number[] {
    return PageSelector.entries(result.selections)
      .flatMap(([, pages]) => pages)
      .sort((a, b) => a - b);
  }

  /**
   * Label each selected page was filed under
   */
  static labelsByPage(result: SelectionResult): Map<number, SelectionLabel> {
    const labels = new Map<number, SelectionLabel>();
    for (const [label, pages] of PageSelector.entries(result.selections)) {
      for (const page of pages) labels.set(page, label);
    }
    return labels;
  }

  private rankInput(
    input: SelectionInput,
    caps: Record<BusinessCategory, number>,
  ): Ranking {
    switch (input.kind) {
      case 'category':
        return {
          candidates: this.rank(
            PageSelector.validatePages(input.pages, input.totalPages),
            caps,
          ),
        };
      case 'complexity':
        return PageSelector.rankComplexity(
          PageSelector.validatePages(input.pages, input.totalPages),
          input.totalPages,
          input.budgetStatus ?? 'NORMAL',
        );
      case 'positional':
        return { candidates: [] };
    }
  }

  private static rankComplexity(
    pages: readonly ComplexityScore[],
    totalPages: number,
    tier: BudgetStatusTier,
  ): Ranking {
    const ranked = rankByComplexity(pages, totalPages, tier);
    if (ranked.length === 0) return { candidates: [] };
    return {
      candidates: ranked.map((candidate): RankedCandidate => ({
        pageNumber: candidate.pageNumber,
        label: 'general',
        pass: candidate.admitted ? 'primary' : 'fill',
      })),
      gating: {
        tier,
        admittedCount: ranked.filter((candidate) => candidate.admitted).length,
        highPriorityPages: ranked
          .filter((candidate) => candidate.highPriority)
          .map((candidate) => candidate.pageNumber),
      },
    };
  }

  private rank(
    pages: readonly CategoryScore[],
    caps: Record<BusinessCategory, number>,
  ): RankedCandidate[] {
    const candidates = pages.filter((page) => page.totalScore > 0);
    const ranked: RankedCandidate[] = [];
    const taken = new Set<number>();

    for (const { category } of CATEGORIES_BY_TIER) {
      const block = candidates
        .filter((page) => page.primaryCategory === category)
        .sort(
          (a, b) =>
            (b.categoryScores[category]?.weightedScore ?? 0) -
              (a.categoryScores[category]?.weightedScore ?? 0) ||
            a.pageNumber - b.pageNumber,
        )
        .slice(0, caps[category]);

      for (const page of block) {
        taken.add(page.pageNumber);
        ranked.push({
          pageNumber: page.pageNumber,
          label: category,
          pass: 'primary',
        });
      }
    }

    const leftovers = candidates
      .filter((page) => !taken.has(page.pageNumber))
      .sort(
        (a, b) => b.totalScore - a.totalScore || a.pageNumber - b.pageNumber,
      );
    for (const page of leftovers) {
      ranked.push({
        pageNumber: page.pageNumber,
        label: 'general',
        pass: 'fill',
      });
    }

    return ranked;
  }

  private selectByPosition(
    builder: SelectionBuilder,
    totalPages: number,
    maxPages: number,
    minPages: number,
  ): PositionalTemplate {
    if (totalPages <= maxPages) {
      builder.fillFrom(ascendingPages(totalPages), totalPages);
      return 'all';
    }

    const template: keyof typeof PAGE_SELECTOR.TEMPLATES =
      totalPages <= PAGE_SELECTOR.SHORT_DOCUMENT_MAX
        ? 'short'
        : totalPages < PAGE_SELECTOR.LONG_DOCUMENT_MIN
          ? 'standard'
          : 'long';

    const positions: readonly number[] = PAGE_SELECTOR.TEMPLATES[template];
    builder.fillFrom(
      positions.filter((page) => page <= totalPages),
      maxPages,
    );
    builder.fillFrom(ascendingPages(totalPages), minPages);

    return template;
  }

  private logAudit(result: SelectionResult): void {
    const { audit } = result;
    const breakdown = PageSelector.entries(audit.breakdown)
      .map(([label, count]) => `${label}=${count}`)
      .join(', ');

    this.logger.info(
      `[PageSelector] Selected ${audit.selectedCount}/${audit.totalPages} pages (${result.mode} mode${audit.template ? `, ${audit.template} template` : ''}) in ${audit.elapsedMs.toFixed(2)}ms`,
    );
    this.logger.info(`[PageSelector] Breakdown: ${breakdown || 'none'}`);
    if (audit.gating) {
      this.logger.info(
        `[PageSelector] Complexity gating (${audit.gating.tier}): ${audit.gating.admittedCount} admitted, ${audit.gating.highPriorityPages.length} high priority`,
      );
    }
    this.logger.info(
      `[PageSelector] Estimated cost $${audit.estimatedCostUsd.toFixed(4)} vs $${audit.fullProcessingCostUsd.toFixed(4)} for all pages (${audit.savingsPct.toFixed(1)}% savings)`,
    );
  }

  private static buildAudit(
    builder: SelectionBuilder,
    totalPages: number,
    costPerPage: number,
    elapsedMs: number,
    template: PositionalTemplate | undefined,
    gating: ComplexityGatingAudit | undefined,
  ): SelectionAudit {
    const breakdown: Partial<Record<SelectionLabel, number>> = {};
    for (const [label, pages] of PageSelector.entries(builder.selections)) {
      breakdown[label] = pages.length;
    }

    const selectedCount = builder.size;
    const estimatedCostUsd = selectedCount * costPerPage;
    const fullProcessingCostUsd = totalPages * costPerPage;
    const estimatedSavingsUsd = fullProcessingCostUsd - estimatedCostUsd;

    return {
      totalPages,
      selectedCount,
      elapsedMs,
      breakdown,
      ...(template ? { template } : {}),
      ...(gating ? { gating } : {}),
      estimatedCostUsd,
      fullProcessingCostUsd,
      estimatedSavingsUsd,
      savingsPct:
        totalPages > 0
          ? ((totalPages - selectedCount) / totalPages) * 100
          : 0,
    };
  }

  private static entries<T>(
    record: Partial<Record<SelectionLabel, T>>,
  ): [SelectionLabel, T][] {
    const entries: [SelectionLabel, T][] = [];
    for (const label of LABEL_ORDER) {
      const value = record[label];
      if (value !== undefined) entries.push([label, value]);
    }
    return entries;
  }

  private static validateBounds(
    totalPages: number,
    maxPages: number,
    minPages: number,
  ): void {
    ContractViolationError.assert(
      Number.isInteger(totalPages) && totalPages >= 0,
      `totalPages must be a non-negative integer, got ${totalPages}`,
    );
    ContractViolationError.assert(
      Number.isInteger(maxPages) && maxPages >= 1,
      `maxPages must be a positive integer, got ${maxPages}`,
    );
    ContractViolationError.assert(
      Number.isInteger(minPages) && minPages >= 0,
      `minPages must be a non-negative integer, got ${minPages}`,
    );
    ContractViolationError.assert(
      maxPages >= minPages,
      `maxPages (${maxPages}) must not be less than minPages (${minPages})`,
    );
  }

  private static validatePages<T extends { pageNumber: number }>(
    pages: readonly T[],
    totalPages: number,
  ): readonly T[] {
    const seen = new Set<number>();
    for (const { pageNumber } of pages) {
      ContractViolationError.assert(
        Number.isInteger(pageNumber) &&
          pageNumber >= 1 &&
          pageNumber <= totalPages,
        `Page ${pageNumber} is outside [1, ${totalPages}]`,
      );
      ContractViolationError.assert(
        !seen.has(pageNumber),
        `Duplicate page ${pageNumber} in scored pages`,
      );
      seen.add(pageNumber);
    }
    return pages;
  }

  private static resolveCaps(
    overrides?: Partial<Record<BusinessCategory, number>>,
  ): Record<BusinessCategory, number> {
    const caps = { ...DEFAULT_CATEGORY_CAPS };
    for (const category of BUSINESS_CATEGORIES) {
      const cap = overrides?.[category] ?? DEFAULT_CATEGORY_CAPS[category];
      ContractViolationError.assert(
        Number.isInteger(cap) && cap >= 0,
        `Cap for ${category} must be a non-negative integer, got ${cap}`,
      );
      caps[category] = cap;
    }
    return caps;
  }
}
