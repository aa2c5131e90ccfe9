import type { BudgetCheck, BudgetStatusTier } from './budget';
import type {
  BusinessCategory,
  CategoryScore,
  SelectionLabel,
} from './category-score';
import type {
  ComplexityDistribution,
  ComplexityScore,
  PageStructuralProfile,
} from './page-profile';
import type { SelectionResult } from './page-selection';

/**
 * Rendered page image handed to a visual analyzer.
 */
export interface RenderedPageImage {
  pageNumber: number;
  /** Encoded image bytes */
  data: Uint8Array;
  mimeType: 'image/png';
  width: number;
  height: number;
  sizeKb: number;
  dpi: number;
}

/** A figure read off a page (e.g. "ARR" → "$2.4M") */
export interface PageDataPoint {
  label: string;
  value: string;
  /** Where or how the figure appears (chart, table, callout) */
  context: string;
}

/**
 * Structured result of analyzing one page image.
 */
export interface PageVisualAnalysis {
  /** Short description of the slide's role (e.g. 'financial projections') */
  pageType: string;
  /** Charts, tables, diagrams and images present on the page */
  visualElements: string[];
  dataPoints: PageDataPoint[];
  insights: string[];
  layoutSummary: string;
  /** Citations of the form "Slide N: …" */
  slideReferences: string[];
}

/** Why an analyzer call failed */
export type AnalysisFailureReason = 'timeout' | 'aborted' | 'api-error';

interface AnalysisOutcomeBase {
  /** Cost actually incurred, including for failed calls */
  costUsd: number;
  durationMs: number;
  modelName: string;
  inputTokens: number;
  outputTokens: number;
}

/**
 * Result of one analyzer call. Analyzers report failures through this union
 * rather than throwing.
 */
export type VisualAnalysisOutcome =
  | (AnalysisOutcomeBase & {
      success: true;
      analysis: PageVisualAnalysis;
    })
  | (AnalysisOutcomeBase & {
      success: false;
      reason: AnalysisFailureReason;
      error: string;
    });

/**
 * Extraction outcome of one page during scanning.
 *
 * - ok: profile and text were read
 * - profile-failed: text read, structural profile missing (fallback complexity)
 * - text-failed: profile read, layout text missing (categories scored from
 *   the profile's words)
 * - failed: neither could be read
 */
export type PageExtractionStatus =
  | 'ok'
  | 'profile-failed'
  | 'text-failed'
  | 'failed';

/**
 * Scan result for one page.
 */
export interface PageScanEntry {
  pageNumber: number;
  extraction: PageExtractionStatus;
  /** Reader error messages, when extraction was incomplete */
  errors: string[];
  profile?: PageStructuralProfile;
  complexity: ComplexityScore;
  category: CategoryScore;
  /** First characters of the page text, for logs and audits */
  textPreview: string;
}

/**
 * Scan of a whole document.
 */
export interface DocumentScan {
  pdfPath: string;
  totalPages: number;
  pages: PageScanEntry[];
  /** Pages whose extraction was not 'ok' */
  degradedPages: number[];
  complexityDistribution: ComplexityDistribution;
  elapsedMs: number;
}

/** Per-page status after the analysis stage */
export type PageAnalysisStatus = 'analyzed' | 'analysis-failed' | 'render-failed';

/**
 * Analysis result for one selected page.
 */
export interface PageAnalysisResult {
  pageNumber: number;
  label: SelectionLabel;
  status: PageAnalysisStatus;
  complexityScore: number;
  primaryCategory?: BusinessCategory;
  analysis?: PageVisualAnalysis;
  costUsd: number;
  durationMs: number;
  imageSizeKb?: number;
  error?: string;
}

/** Why the caller should fall back to text-only analysis */
export type FallbackReason =
  | 'vision-disabled'
  | 'no-pages'
  | 'budget-exhausted'
  | 'no-successful-analyses';

/** Document type inferred from the file name, used to frame prompts */
export type DocumentType =
  | 'Pitch Deck'
  | 'Financial Model'
  | 'Executive Summary'
  | 'Investment Document';

/**
 * Coverage and quality figures for a finished run.
 */
export interface AnalysisQualityMetrics {
  /** Successful analyses over attempted analyses, in percent */
  successRatePct: number;
  /** Categories with at least one successfully analyzed page */
  categoriesCovered: BusinessCategory[];
  categoriesMissing: BusinessCategory[];
  categoryCoveragePct: number;
  /** Selected pages over total pages */
  visualPageRatio: number;
  averageDurationMs: number;
  averageImageSizeKb: number;
}

/**
 * Aggregates reported with every document analysis.
 */
export interface AnalysisMetadata {
  documentType: DocumentType;
  totalPagesAnalyzed: number;
  successfulAnalyses: number;
  failedAnalyses: number;
  renderFailures: number;
  totalCostUsd: number;
  /** Cost of analyzing every page at the per-call estimate */
  fullProcessingCostUsd: number;
  /** (full − actual) / full × 100; 0 for empty documents */
  costSavingsPct: number;
  budgetStatus: BudgetStatusTier;
  complexityDistribution: ComplexityDistribution;
  quality: AnalysisQualityMetrics;
  slideReferences: string[];
  /** Set when the caller should use text-only analysis instead */
  fallbackRequired: boolean;
  fallbackReason?: FallbackReason;
  elapsedMs: number;
}

/**
 * Result of running the analysis pipeline over a document.
 *
 * Always well-formed; degraded runs set `metadata.fallbackRequired`.
 */
export interface DocumentAnalysisResult {
  pdfPath: string;
  totalPages: number;
  /** null when the run stopped before selection */
  selection: SelectionResult | null;
  /** null when vision was disabled or the document had no pages */
  budget: BudgetCheck | null;
  pages: PageAnalysisResult[];
  metadata: AnalysisMetadata;
}
