import type { LoggerMethods } from '@pagewise/logger';
import type {
  AnalysisMetadata,
  AnalysisQualityMetrics,
  BudgetCheck,
  BudgetReservation,
  BusinessCategory,
  CategoryScore,
  DocumentAnalysisResult,
  DocumentScan,
  DocumentType,
  FallbackReason,
  PageAnalysisResult,
  PageScanEntry,
  RenderedPageImage,
  SelectionLabel,
  SelectionMode,
  SelectionResult,
  VisualAnalysisOutcome,
} from '@pagewise/model';
import type { PoolProgress } from '@pagewise/shared';
import type { LanguageModel } from 'ai';

import type {
  PageImageRenderer,
  PdfReader,
  VisualAnalyzer,
} from '../types/collaborators';
import type { PageAnalysisConfig } from '../config/page-analysis-config';
import type { SelectionInput } from '../selectors/page-selector';

import { createLogger } from '@pagewise/logger';
import { ConcurrentPool } from '@pagewise/shared';
import { meanBy, sumBy } from 'es-toolkit';
import { basename } from 'node:path';

import { BudgetLedger } from '../budget/budget-ledger';
import { BUSINESS_CATEGORIES } from '../config/categories';
import { loadPageAnalysisConfig } from '../config/page-analysis-config';
import { PdfReadError } from '../errors/pdf-read-error';
import { LLMVisualAnalyzer } from '../processors/llm-visual-analyzer';
import { PageRenderer } from '../processors/page-renderer';
import { PopplerPdfReader } from '../processors/poppler-pdf-reader';
import {
  buildPageAnalysisPrompt,
  inferDocumentType,
} from '../prompts/page-analysis-prompt';
import { CategoryScorer } from '../scorers/category-scorer';
import { ComplexityScorer } from '../scorers/complexity-scorer';
import { PageSelector } from '../selectors/page-selector';
import { DocumentScanner } from './document-scanner';

/** Options for PageAnalysisPipeline.process */
export interface ProcessDocumentOptions {
  /** Overrides the configured maximum number of analyzed pages */
  maxPages?: number;
  /** Overrides the configured minimum number of analyzed pages */
  minPages?: number;
  /** Per-category caps, merged over the configured caps */
  categoryCaps?: Partial<Record<BusinessCategory, number>>;
  /**
   * 'complexity' ranks pages by visual value and admits them by budget tier;
   * 'positional' skips scoring (default: 'category')
   */
  selectionMode?: SelectionMode;
  /** Aborts analyzer calls that have not finished */
  abortSignal?: AbortSignal;
  /** Called as each selected page finishes */
  onPageComplete?: (result: PageAnalysisResult, progress: PoolProgress) => void;
}

/** Options for PageAnalysisPipeline.create */
export interface CreatePageAnalysisPipelineOptions {
  /** Vision model for the default analyzer */
  model: LanguageModel;
  /** Tried once when the primary model fails */
  fallbackModel?: LanguageModel;
  /** Resolved configuration (default: loaded from the environment) */
  config?: PageAnalysisConfig;
  /** Logger (default: console logger at the configured level) */
  logger?: LoggerMethods;
  /** Ledger to share across pipelines (default: a new ledger from config) */
  ledger?: BudgetLedger;
  reader?: PdfReader;
  renderer?: PageImageRenderer;
  analyzer?: VisualAnalyzer;
}

/** Per-document state shared by the analysis steps */
interface RunContext {
  pdfPath: string;
  documentType: DocumentType;
  startedAt: number;
}

/** What each page task needs once pages are selected */
interface PageTaskContext extends RunContext {
  totalPages: number;
  reservation: BudgetReservation;
  abortSignal?: AbortSignal;
}

/**
 * Orchestrates cost-constrained visual analysis of a PDF.
 *
 * Execution order:
 * 1. DocumentScanner.scan(): page count, profiles, text, scores
 * 2. BudgetLedger.checkAvailability(): shrink candidates to what is affordable
 * 3. PageSelector.select(): choose the pages worth a vision call, then
 *    reserve their estimated cost on the ledger
 * 4. Render, analyze and record spend per page through ConcurrentPool,
 *    releasing the unused reservation at the end
 * 5. Aggregate costs, coverage and quality metrics
 *
 * Degraded runs (vision disabled, unreadable or empty documents, exhausted
 * budget, no successful analysis) return a well-formed result with
 * `fallbackRequired` set instead of throwing.
 */
export class PageAnalysisPipeline {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly scanner: DocumentScanner,
    private readonly selector: PageSelector,
    readonly ledger: BudgetLedger,
    private readonly renderer: PageImageRenderer,
    private readonly analyzer: VisualAnalyzer,
    private readonly config: PageAnalysisConfig,
  ) {}

  /**
   * Factory method wiring the default command-line and AI SDK adapters.
   *
   * @throws ConfigurationError when no config is given and the environment is invalid
   */
  static create(options: CreatePageAnalysisPipelineOptions): PageAnalysisPipeline {
    const config = options.config ?? loadPageAnalysisConfig();
    const logger = options.logger ?? createLogger({ level: config.logLevel });

    const scanner = new DocumentScanner(
      logger,
      options.reader ?? new PopplerPdfReader(logger),
      new ComplexityScorer({ threshold: config.complexityThreshold }),
      new CategoryScorer(),
    );
    const ledger =
      options.ledger ??
      new BudgetLedger(logger, {
        costPerCall: config.costPerCall,
        ...config.budget,
      });
    const analyzer =
      options.analyzer ??
      new LLMVisualAnalyzer(logger, {
        model: options.model,
        fallbackModel: options.fallbackModel,
        costPerCall: config.costPerCall,
      });

    return new PageAnalysisPipeline(
      logger,
      scanner,
      new PageSelector(logger),
      ledger,
      options.renderer ?? new PageRenderer(logger),
      analyzer,
      config,
    );
  }

  /**
   * Select and analyze the pages of one document.
   *
   * @throws ContractViolationError for invalid selection bounds
   */
  async process(
    pdfPath: string,
    options?: ProcessDocumentOptions,
  ): Promise<DocumentAnalysisResult> {
    const run: RunContext = {
      pdfPath,
      documentType: inferDocumentType(basename(pdfPath)),
      startedAt: Date.now(),
    };

    if (!this.config.visionEnabled) {
      this.logger.info(
        '[PageAnalysisPipeline] Visual analysis disabled, requesting text-only fallback',
      );
      return this.fallbackResult(run, 'vision-disabled', null, null);
    }

    this.logger.info(
      `[PageAnalysisPipeline] Processing ${basename(pdfPath)} (${run.documentType})...`,
    );

    // Step 1: Scan and score every page
    let scan: DocumentScan;
    try {
      scan = await this.scanner.scan(pdfPath);
    } catch (error) {
      if (!(error instanceof PdfReadError)) throw error;
      this.logger.error(
        `[PageAnalysisPipeline] Cannot read ${pdfPath}: ${error.message}`,
      );
      return this.fallbackResult(run, 'no-pages', null, null);
    }

    if (scan.totalPages === 0) {
      this.logger.warn(`[PageAnalysisPipeline] ${pdfPath} has no pages`);
      return this.fallbackResult(run, 'no-pages', scan, null);
    }

    // Steps 2 and 3 must not await before the reservation is taken: another
    // run on the same ledger would see the budget as still free

    // Step 2: Check the budget and shrink candidates to what is affordable
    let maxPages = options?.maxPages ?? this.config.selection.maxPages;
    let minPages = options?.minPages ?? this.config.selection.minPages;
    const categoryCaps = this.resolveCategoryCaps(options?.categoryCaps);

    let input = PageAnalysisPipeline.selectionInput(
      scan,
      options?.selectionMode ?? 'category',
    );

    const budget = this.ledger.checkAvailability(
      this.candidateCount(input, maxPages, minPages),
    );
    if (input.kind === 'complexity') {
      input = { ...input, budgetStatus: budget.status };
    }

    if (!budget.canAffordAllPages) {
      const affordable = budget.maxAffordablePages;
      if (affordable === 0) {
        this.logger.warn(
          `[PageAnalysisPipeline] ${budget.limitingWindow} budget exhausted, requesting text-only fallback`,
        );
        return this.fallbackResult(run, 'budget-exhausted', scan, budget);
      }

      this.logger.warn(
        `[PageAnalysisPipeline] Budget allows ${affordable} of ${budget.candidatePageCount} pages (limited by ${budget.limitingWindow} budget)`,
      );
      maxPages = Math.min(maxPages, affordable);
      minPages = Math.min(minPages, maxPages);
      if (input.kind === 'category') {
        input = {
          ...input,
          pages: this.shrinkCandidates(input.pages, categoryCaps, affordable),
        };
      }
    }

    // Step 3: Select pages
    const selection = this.selector.select(input, {
      maxPages,
      minPages,
      categoryCaps,
      costPerPage: this.ledger.costPerCall,
    });
    const task: PageTaskContext = {
      ...run,
      totalPages: scan.totalPages,
      reservation: this.ledger.reserve(selection.audit.selectedCount),
      abortSignal: options?.abortSignal,
    };

    // Step 4: Render, analyze and record each selected page
    const entries = new Map(scan.pages.map((page) => [page.pageNumber, page]));
    const labels = PageSelector.labelsByPage(selection);
    const selectedPages = PageSelector.flatten(selection).flatMap(
      (pageNumber) => {
        const entry = entries.get(pageNumber);
        const label = labels.get(pageNumber);
        return entry && label ? [{ entry, label }] : [];
      },
    );

    let pages: PageAnalysisResult[];
    try {
      pages = await ConcurrentPool.run(
        selectedPages,
        this.config.concurrency,
        ({ entry, label }) => this.analyzePage(task, entry, label),
        options?.onPageComplete,
      );
    } finally {
      this.ledger.release(task.reservation);
    }

    // Step 5: Aggregate
    return this.buildResult(run, scan, selection, budget, pages);
  }

  private static selectionInput(
    scan: DocumentScan,
    mode: SelectionMode,
  ): SelectionInput {
    switch (mode) {
      case 'category':
        return {
          kind: 'category',
          totalPages: scan.totalPages,
          pages: scan.pages.map((page) => page.category),
        };
      case 'complexity':
        return {
          kind: 'complexity',
          totalPages: scan.totalPages,
          pages: scan.pages.map((page) => page.complexity),
        };
      case 'positional':
        return { kind: 'positional', totalPages: scan.totalPages };
    }
  }

  /**
   * Pages to price before selection: every scored candidate plus top-up
   * pages, at most the maximum in complexity mode, or the whole document
   * when selection will be positional
   */
  private candidateCount(
    input: SelectionInput,
    maxPages: number,
    minPages: number,
  ): number {
    if (input.kind === 'positional') return input.totalPages;
    if (input.kind === 'complexity') {
      return Math.min(input.totalPages, maxPages);
    }

    const scored = input.pages.filter((page) => page.totalScore > 0).length;
    if (scored === 0) return input.totalPages;

    const fillTarget =
      input.totalPages <= maxPages ? input.totalPages : minPages;
    return Math.max(scored, fillTarget);
  }

  /**
   * Keep the `affordable` highest-priority candidates, in selection order
   */
  private shrinkCandidates(
    pages: readonly CategoryScore[],
    categoryCaps: Record<BusinessCategory, number>,
    affordable: number,
  ): CategoryScore[] {
    const keep = new Set(
      this.selector.rankCandidates(pages, categoryCaps).slice(0, affordable),
    );
    return pages.filter((page) => keep.has(page.pageNumber));
  }

  private resolveCategoryCaps(
    overrides?: Partial<Record<BusinessCategory, number>>,
  ): Record<BusinessCategory, number> {
    const caps = { ...this.config.selection.categoryCaps };
    for (const category of BUSINESS_CATEGORIES) {
      caps[category] = overrides?.[category] ?? caps[category];
    }
    return caps;
  }

  private async analyzePage(
    run: PageTaskContext,
    entry: PageScanEntry,
    label: SelectionLabel,
  ): Promise<PageAnalysisResult> {
    const { pageNumber } = entry;
    const startedAt = Date.now();
    const base = {
      pageNumber,
      label,
      complexityScore: entry.complexity.score,
      ...(entry.category.primaryCategory
        ? { primaryCategory: entry.category.primaryCategory }
        : {}),
    };

    let image: RenderedPageImage;
    try {
      image = await this.renderer.renderPage(run.pdfPath, pageNumber, {
        dpi: this.config.rendering.dpi,
        maxDimension: this.config.rendering.maxDimension,
      });
    } catch (error) {
      const message = PdfReadError.getErrorMessage(error);
      this.logger.warn(
        `[PageAnalysisPipeline] Page ${pageNumber} render failed, skipping: ${message}`,
      );
      return {
        ...base,
        status: 'render-failed',
        costUsd: 0,
        durationMs: Date.now() - startedAt,
        error: message,
      };
    }

    const context = {
      pdfPath: run.pdfPath,
      documentType: run.documentType,
      totalPages: run.totalPages,
      pageNumber,
      label,
      keywordsFound: Object.values(entry.category.categoryScores).flatMap(
        (match) => match?.keywordsFound ?? [],
      ),
    };

    const timeout = AbortSignal.timeout(this.config.callTimeoutMs);
    const analysisStartedAt = Date.now();
    let outcome: VisualAnalysisOutcome;
    try {
      outcome = await this.analyzer.analyze({
        image,
        prompt: buildPageAnalysisPrompt(context),
        context,
        abortSignal: run.abortSignal
          ? AbortSignal.any([run.abortSignal, timeout])
          : timeout,
      });
    } catch (error) {
      const message = PdfReadError.getErrorMessage(error);
      this.logger.warn(
        `[PageAnalysisPipeline] Page ${pageNumber} analyzer threw: ${message}`,
      );
      outcome = {
        success: false,
        reason: 'api-error',
        error: message,
        costUsd: 0,
        durationMs: Date.now() - analysisStartedAt,
        modelName: 'unknown',
        inputTokens: 0,
        outputTokens: 0,
      };
    }

    this.ledger.record(
      {
        pageNumber,
        costUsd: outcome.costUsd,
        imageSizeKb: image.sizeKb,
        durationMs: outcome.durationMs,
        success: outcome.success,
        modelName: outcome.modelName,
        documentId: run.pdfPath,
      },
      run.reservation,
    );

    if (!outcome.success) {
      return {
        ...base,
        status: 'analysis-failed',
        costUsd: outcome.costUsd,
        durationMs: outcome.durationMs,
        imageSizeKb: image.sizeKb,
        error: `${outcome.reason}: ${outcome.error}`,
      };
    }

    this.logger.info(
      `[PageAnalysisPipeline] Page ${pageNumber} (${label}) analyzed: ${outcome.analysis.pageType}`,
    );
    return {
      ...base,
      status: 'analyzed',
      analysis: outcome.analysis,
      costUsd: outcome.costUsd,
      durationMs: outcome.durationMs,
      imageSizeKb: image.sizeKb,
    };
  }

  private buildResult(
    run: RunContext,
    scan: DocumentScan,
    selection: SelectionResult,
    budget: BudgetCheck,
    pages: PageAnalysisResult[],
  ): DocumentAnalysisResult {
    const attempted = pages.filter((page) => page.status !== 'render-failed');
    const successful = pages.filter((page) => page.status === 'analyzed');
    const totalCostUsd = sumBy(pages, (page) => page.costUsd);
    const fullProcessingCostUsd = scan.totalPages * this.ledger.costPerCall;

    const covered = BUSINESS_CATEGORIES.filter((category) =>
      successful.some(
        (page) => page.label === category || page.primaryCategory === category,
      ),
    );
    const rendered = pages.filter((page) => page.imageSizeKb !== undefined);

    const quality: AnalysisQualityMetrics = {
      successRatePct:
        attempted.length > 0 ? (successful.length / attempted.length) * 100 : 0,
      categoriesCovered: covered,
      categoriesMissing: BUSINESS_CATEGORIES.filter(
        (category) => !covered.includes(category),
      ),
      categoryCoveragePct: (covered.length / BUSINESS_CATEGORIES.length) * 100,
      visualPageRatio: selection.audit.selectedCount / scan.totalPages,
      averageDurationMs:
        attempted.length > 0 ? meanBy(attempted, (page) => page.durationMs) : 0,
      averageImageSizeKb:
        rendered.length > 0
          ? meanBy(rendered, (page) => page.imageSizeKb ?? 0)
          : 0,
    };

    const slideReferences = [
      ...new Set(
        successful.flatMap((page) => page.analysis?.slideReferences ?? []),
      ),
    ];
    const fallbackRequired = successful.length === 0;

    const metadata: AnalysisMetadata = {
      documentType: run.documentType,
      totalPagesAnalyzed: attempted.length,
      successfulAnalyses: successful.length,
      failedAnalyses: attempted.length - successful.length,
      renderFailures: pages.length - attempted.length,
      totalCostUsd,
      fullProcessingCostUsd,
      costSavingsPct:
        fullProcessingCostUsd > 0
          ? ((fullProcessingCostUsd - totalCostUsd) / fullProcessingCostUsd) *
            100
          : 0,
      budgetStatus: this.ledger.getWindowStatus('daily').status,
      complexityDistribution: scan.complexityDistribution,
      quality,
      slideReferences,
      fallbackRequired,
      ...(fallbackRequired
        ? { fallbackReason: 'no-successful-analyses' as const }
        : {}),
      elapsedMs: Date.now() - run.startedAt,
    };

    this.logger.info(
      `[PageAnalysisPipeline] Analyzed ${successful.length}/${attempted.length} pages of ${scan.totalPages} for $${totalCostUsd.toFixed(4)} (${metadata.costSavingsPct.toFixed(1)}% saved vs all pages)`,
    );
    if (quality.categoriesMissing.length > 0) {
      this.logger.info(
        `[PageAnalysisPipeline] Categories not covered: ${quality.categoriesMissing.join(', ')}`,
      );
    }
    if (fallbackRequired) {
      this.logger.warn(
        '[PageAnalysisPipeline] No page was analyzed successfully, requesting text-only fallback',
      );
    }

    return {
      pdfPath: run.pdfPath,
      totalPages: scan.totalPages,
      selection,
      budget,
      pages,
      metadata,
    };
  }

  private fallbackResult(
    run: RunContext,
    reason: FallbackReason,
    scan: DocumentScan | null,
    budget: BudgetCheck | null,
  ): DocumentAnalysisResult {
    const totalPages = scan?.totalPages ?? 0;
    const fullProcessingCostUsd = totalPages * this.ledger.costPerCall;

    return {
      pdfPath: run.pdfPath,
      totalPages,
      selection: null,
      budget,
      pages: [],
      metadata: {
        documentType: run.documentType,
        totalPagesAnalyzed: 0,
        successfulAnalyses: 0,
        failedAnalyses: 0,
        renderFailures: 0,
        totalCostUsd: 0,
        fullProcessingCostUsd,
        costSavingsPct: fullProcessingCostUsd > 0 ? 100 : 0,
        budgetStatus: this.ledger.getWindowStatus('daily').status,
        complexityDistribution: scan?.complexityDistribution ?? {
          high: 0,
          medium: 0,
          low: 0,
        },
        quality: {
          successRatePct: 0,
          categoriesCovered: [],
          categoriesMissing: [...BUSINESS_CATEGORIES],
          categoryCoveragePct: 0,
          visualPageRatio: 0,
          averageDurationMs: 0,
          averageImageSizeKb: 0,
        },
        slideReferences: [],
        fallbackRequired: true,
        fallbackReason: reason,
        elapsedMs: Date.now() - run.startedAt,
      },
    };
  }
}
