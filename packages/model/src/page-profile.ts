/**
 * Structural facts about a single PDF page, as reported by a PDF reader.
 *
 * Read-only input to the complexity and category scorers.
 */
export interface PageStructuralProfile {
  /** 1-based page number */
  pageNumber: number;

  /** Number of embedded raster images */
  imageCount: number;

  /** Number of vector drawing primitives (paths, shapes, chart strokes) */
  drawingCount: number;

  /** Fraction of the page area covered by text blocks (0-1) */
  textAreaRatio: number;

  /** Number of distinct colors observed on the page */
  colorDiversity: number;

  /** Number of distinct text or image blocks */
  blockCount: number;

  /** Extracted page text (may be empty) */
  textContent: string;
}

/**
 * Profile as accepted by the complexity scorer.
 *
 * Readers may fail to report individual fields; missing fields count as zero.
 */
export type PartialPageProfile = Pick<PageStructuralProfile, 'pageNumber'> &
  Partial<Omit<PageStructuralProfile, 'pageNumber'>>;

/**
 * Clamped 0-1 sub-scores that make up a complexity score.
 */
export interface ComplexitySubScores {
  /** min(images × 0.3, 1) */
  image: number;
  /** min(drawings × 0.1, 1) */
  drawing: number;
  /** 0.4 when the page has more than 5 blocks, else 0 */
  layout: number;
  /** min(colors / 50, 1) */
  color: number;
  /** 1 − text area ratio; sparse text suggests visual content */
  textComplement: number;
}

/**
 * Visual complexity of one page.
 *
 * Deterministic: the same profile always yields the same score.
 */
export interface ComplexityScore {
  pageNumber: number;

  /** Weighted score in [0, 1], boost included */
  score: number;

  subScores: ComplexitySubScores;

  /**
   * Whether the financial-keyword boost applied (financial vocabulary
   * together with images or more than three drawings)
   */
  financialBoost: boolean;

  /** Score at or above the threshold, or boosted */
  requiresVisualAnalysis: boolean;

  /**
   * 'profile' when computed from a structural profile, 'fallback' when the
   * profile could not be read and a fixed score was assigned
   */
  source: 'profile' | 'fallback';
}

/**
 * Number of pages per complexity band.
 */
export interface ComplexityDistribution {
  /** score > 0.7 */
  high: number;
  /** 0.4 <= score <= 0.7 */
  medium: number;
  /** score < 0.4 */
  low: number;
}
