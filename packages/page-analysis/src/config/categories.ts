import type { BusinessCategory } from '@pagewise/model';

import categoryKeywords from './category-keywords.json';

/** Priority tier; tier 1 is filled first and weighs the most */
export type PriorityTier = 1 | 2 | 3;

export interface CategoryDefinition {
  category: BusinessCategory;
  tier: PriorityTier;
  /** Default cap on pages selected for this category */
  maxPages: number;
  /** Lowercased keywords matched as substrings of lowercased page text */
  keywords: readonly string[];
}

const KEYWORDS = categoryKeywords satisfies Record<
  BusinessCategory,
  readonly string[]
>;

/** Default per-category page caps */
export const DEFAULT_CATEGORY_CAPS: Readonly<Record<BusinessCategory, number>> =
  {
    financials: 3,
    competition: 3,
    market: 2,
    traction: 2,
    team: 1,
  };

const TIERS: Readonly<Record<BusinessCategory, PriorityTier>> = {
  financials: 1,
  competition: 1,
  market: 2,
  traction: 2,
  team: 3,
};

/** Fixed declaration order; breaks ties between equal scores and equal tiers */
export const BUSINESS_CATEGORIES: readonly BusinessCategory[] = [
  'financials',
  'competition',
  'market',
  'traction',
  'team',
];

export const CATEGORY_DEFINITIONS: readonly CategoryDefinition[] =
  BUSINESS_CATEGORIES.map((category) => ({
    category,
    tier: TIERS[category],
    maxPages: DEFAULT_CATEGORY_CAPS[category],
    keywords: KEYWORDS[category].map((keyword) => keyword.toLowerCase()),
  }));

/**
 * Category definitions sorted by tier, declaration order within a tier.
 */
export const CATEGORIES_BY_TIER: readonly CategoryDefinition[] = [
  ...CATEGORY_DEFINITIONS,
].sort(
  (a, b) =>
    a.tier - b.tier ||
    BUSINESS_CATEGORIES.indexOf(a.category) -
      BUSINESS_CATEGORIES.indexOf(b.category),
);
