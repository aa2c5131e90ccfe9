/**
 * Business categories a pitch-deck page can belong to, in declaration order.
 */
export type BusinessCategory =
  | 'financials'
  | 'competition'
  | 'market'
  | 'traction'
  | 'team';

/**
 * Label a selected page is filed under. Pages picked by position or by
 * the fill pass (once their category is full) are labelled 'general'.
 */
export type SelectionLabel = BusinessCategory | 'general';

/**
 * Keyword matches of one category on one page
 */
export interface CategoryMatch {
  /** Number of category keywords found in the page text */
  rawMatches: number;

  /** rawMatches × (4 − tier) + min(rawMatches / 10, 0.5) */
  weightedScore: number;

  /** Matched keywords, lowercased, in keyword-list order */
  keywordsFound: string[];
}

/**
 * Category relevance of one page.
 */
export interface CategoryScore {
  pageNumber: number;

  /** Only categories with at least one match are present */
  categoryScores: Partial<Record<BusinessCategory, CategoryMatch>>;

  /** Sum of all weighted scores; 0 when nothing matched */
  totalScore: number;

  /**
   * Category with the highest weighted score (ties go to the category
   * declared first). Absent when totalScore is 0.
   */
  primaryCategory?: BusinessCategory;
}
