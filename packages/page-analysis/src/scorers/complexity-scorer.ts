import type {
  ComplexityDistribution,
  ComplexityScore,
  ComplexitySubScores,
  PartialPageProfile,
} from '@pagewise/model';

import { clamp } from 'es-toolkit';

import { COMPLEXITY_SCORER } from '../config/constants';

/** Options for ComplexityScorer */
export interface ComplexityScorerOptions {
  /** Score at or above which a page needs visual analysis (default: 0.6) */
  threshold?: number;
}

/** Non-negative finite value, or 0 */
function sanitize(value: number | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0
    ? value
    : 0;
}

/**
 * Scores how visually complex a page is from its structural profile.
 *
 * Pure and deterministic. Malformed profile fields count as zero; the
 * scorer never throws.
 */
export class ComplexityScorer {
  private readonly threshold: number;

  constructor(options?: ComplexityScorerOptions) {
    this.threshold = options?.threshold ?? COMPLEXITY_SCORER.DEFAULT_THRESHOLD;
  }

  score(profile: PartialPageProfile): ComplexityScore {
    const images = sanitize(profile.imageCount);
    const drawings = sanitize(profile.drawingCount);
    const blocks = sanitize(profile.blockCount);
    const colors = sanitize(profile.colorDiversity);
    const textArea = clamp(sanitize(profile.textAreaRatio), 0, 1);

    const subScores: ComplexitySubScores = {
      image: Math.min(images * COMPLEXITY_SCORER.IMAGE_UNIT, 1),
      drawing: Math.min(drawings * COMPLEXITY_SCORER.DRAWING_UNIT, 1),
      layout:
        blocks > COMPLEXITY_SCORER.LAYOUT_BLOCK_THRESHOLD
          ? COMPLEXITY_SCORER.LAYOUT_SCORE
          : 0,
      color: Math.min(colors / COMPLEXITY_SCORER.COLOR_SATURATION, 1),
      textComplement: 1 - textArea,
    };

    const { WEIGHTS } = COMPLEXITY_SCORER;
    const weighted =
      subScores.image * WEIGHTS.image +
      subScores.drawing * WEIGHTS.drawing +
      subScores.layout * WEIGHTS.layout +
      subScores.color * WEIGHTS.color +
      subScores.textComplement * WEIGHTS.textComplement;

    const financialBoost =
      ComplexityScorer.hasFinancialKeyword(profile.textContent) &&
      (images > 0 || drawings > COMPLEXITY_SCORER.BOOST_DRAWING_THRESHOLD);

    const score = clamp(
      weighted + (financialBoost ? COMPLEXITY_SCORER.FINANCIAL_BOOST : 0),
      0,
      1,
    );

    return {
      pageNumber: profile.pageNumber,
      score,
      subScores,
      financialBoost,
      requiresVisualAnalysis: financialBoost || score >= this.threshold,
      source: 'profile',
    };
  }

  /**
   * Score assigned to a page whose profile could not be read.
   */
  fallback(pageNumber: number): ComplexityScore {
    return {
      pageNumber,
      score: COMPLEXITY_SCORER.FALLBACK_SCORE,
      subScores: {
        image: 0,
        drawing: 0,
        layout: 0,
        color: 0,
        textComplement: 0,
      },
      financialBoost: false,
      requiresVisualAnalysis: false,
      source: 'fallback',
    };
  }

  static hasFinancialKeyword(text: string | undefined): boolean {
    if (!text) return false;
    const lower = text.toLowerCase();
    return COMPLEXITY_SCORER.FINANCIAL_KEYWORDS.some((keyword) =>
      lower.includes(keyword),
    );
  }

  /**
   * Count pages per complexity band (high > 0.7, low < 0.4, medium otherwise).
   */
  static distribution(
    scores: readonly Pick<ComplexityScore, 'score'>[],
  ): ComplexityDistribution {
    const distribution: ComplexityDistribution = { high: 0, medium: 0, low: 0 };
    for (const { score } of scores) {
      if (score > COMPLEXITY_SCORER.DISTRIBUTION_HIGH) distribution.high++;
      else if (score < COMPLEXITY_SCORER.DISTRIBUTION_LOW) distribution.low++;
      else distribution.medium++;
    }
    return distribution;
  }
}
