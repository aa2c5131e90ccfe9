import type {
  BusinessCategory,
  CategoryMatch,
  CategoryScore,
} from '@pagewise/model';

import type { CategoryDefinition } from '../config/categories';

import { CATEGORY_DEFINITIONS } from '../config/categories';
import { CATEGORY_SCORER } from '../config/constants';

/**
 * Scores how relevant a page's text is to each business category.
 *
 * Keywords are counted once each, by case-insensitive substring match.
 * Higher-priority tiers weigh more, with a small capped bonus for keyword
 * density:
 *
 *   weighted = matches × (4 − tier) + min(matches / 10, 0.5)
 */
export class CategoryScorer {
  constructor(
    private readonly definitions: readonly CategoryDefinition[] = CATEGORY_DEFINITIONS,
  ) {}

  score(pageNumber: number, text: string): CategoryScore {
    const lower = text.toLowerCase();
    const categoryScores: Partial<Record<BusinessCategory, CategoryMatch>> =
      {};
    let totalScore = 0;
    let primaryCategory: BusinessCategory | undefined;
    let best = 0;

    for (const definition of this.definitions) {
      const keywordsFound = definition.keywords.filter((keyword) =>
        lower.includes(keyword),
      );
      const rawMatches = keywordsFound.length;
      if (rawMatches === 0) continue;

      const weightedScore =
        rawMatches * (CATEGORY_SCORER.TIER_BASE - definition.tier) +
        Math.min(
          rawMatches * CATEGORY_SCORER.DENSITY_FACTOR,
          CATEGORY_SCORER.DENSITY_CAP,
        );

      categoryScores[definition.category] = {
        rawMatches,
        weightedScore,
        keywordsFound,
      };
      totalScore += weightedScore;

      // Strictly greater: earlier declarations win ties
      if (weightedScore > best) {
        best = weightedScore;
        primaryCategory = definition.category;
      }
    }

    return primaryCategory === undefined
      ? { pageNumber, categoryScores, totalScore }
      : { pageNumber, categoryScores, totalScore, primaryCategory };
  }

  /**
   * Collapse whitespace and keep the first characters of a page's text.
   */
  static preview(
    text: string,
    length: number = CATEGORY_SCORER.PREVIEW_LENGTH,
  ): string {
    const collapsed = text.replace(/\s+/g, ' ').trim();
    return collapsed.length > length
      ? `${collapsed.slice(0, length)}...`
      : collapsed;
  }
}
