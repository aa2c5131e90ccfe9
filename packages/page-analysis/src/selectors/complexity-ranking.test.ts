import type { ComplexityScore } from '@pagewise/model';

import { describe, expect, test } from 'vitest';

import {
  isAdmitted,
  isHighPriority,
  pagePriority,
  pageValueScore,
  rankByComplexity,
} from './complexity-ranking';

function complexity(
  pageNumber: number,
  score: number,
  options: { images?: boolean; drawings?: boolean; boosted?: boolean } = {},
): ComplexityScore {
  return {
    pageNumber,
    score,
    subScores: {
      image: options.images ? 0.6 : 0,
      drawing: options.drawings ? 0.2 : 0,
      layout: 0,
      color: 0,
      textComplement: 0,
    },
    financialBoost: options.boosted ?? false,
    requiresVisualAnalysis: score >= 0.6 || (options.boosted ?? false),
    source: 'profile',
  };
}

describe('pagePriority', () => {
  test.each([
    [1, 0.9],
    [3, 0.9],
    [4, 0.5],
    [17, 0.5],
    [18, 0.7],
    [20, 0.7],
  ])('gives page %i of 20 priority %s', (pageNumber, expected) => {
    expect(pagePriority(pageNumber, 20)).toBe(expected);
  });
});

describe('pageValueScore', () => {
  test('weights complexity and adds image and drawing bonuses', () => {
    expect(
      pageValueScore(complexity(8, 0.5, { images: true, drawings: true })),
    ).toBeCloseTo(0.65);
  });

  test('adds the opening bonus to the first three pages', () => {
    expect(pageValueScore(complexity(2, 0.5))).toBeCloseTo(0.4);
  });

  test('never exceeds one', () => {
    expect(
      pageValueScore(complexity(1, 1, { images: true, drawings: true })),
    ).toBe(1);
  });
});

describe('isHighPriority', () => {
  test('holds for very complex pages', () => {
    expect(isHighPriority(complexity(9, 0.8))).toBe(true);
  });

  test('holds for moderately complex pages with images', () => {
    expect(isHighPriority(complexity(9, 0.6, { images: true }))).toBe(true);
    expect(isHighPriority(complexity(9, 0.6))).toBe(false);
  });
});

describe('isAdmitted', () => {
  test('admits pages that need visual analysis in the normal tier', () => {
    expect(isAdmitted(complexity(9, 0.6), 20, 'NORMAL')).toBe(true);
    expect(
      isAdmitted(complexity(9, 0.3, { boosted: true }), 20, 'NORMAL'),
    ).toBe(true);
    expect(isAdmitted(complexity(9, 0.59), 20, 'NORMAL')).toBe(false);
  });

  test('admits complex or closing pages in the warning tier', () => {
    expect(isAdmitted(complexity(9, 0.7), 20, 'WARNING')).toBe(true);
    expect(isAdmitted(complexity(19, 0.1), 20, 'WARNING')).toBe(true);
    expect(isAdmitted(complexity(9, 0.65), 20, 'WARNING')).toBe(false);
  });

  test('admits only very complex opening pages in the critical tier', () => {
    expect(isAdmitted(complexity(2, 0.9), 20, 'CRITICAL')).toBe(true);
    expect(isAdmitted(complexity(9, 0.95), 20, 'CRITICAL')).toBe(false);
  });

  test('admits opening pages of moderate complexity in every tier', () => {
    expect(isAdmitted(complexity(3, 0.5), 20, 'CRITICAL')).toBe(true);
    expect(isAdmitted(complexity(4, 0.5), 20, 'CRITICAL')).toBe(false);
  });
});

describe('rankByComplexity', () => {
  test('orders high priority, then admitted, then the rest', () => {
    const ranked = rankByComplexity(
      [
        complexity(5, 0.3),
        complexity(6, 0.6),
        complexity(7, 0.9),
        complexity(8, 0.59, { images: true, drawings: true }),
      ],
      20,
      'NORMAL',
    );

    expect(ranked.map((candidate) => candidate.pageNumber)).toEqual([
      7, 6, 8, 5,
    ]);
    expect(ranked[0]).toEqual({
      pageNumber: 7,
      value: expect.closeTo(0.54, 10),
      admitted: true,
      highPriority: true,
    });
    expect(ranked[2]).toEqual({
      pageNumber: 8,
      value: expect.closeTo(0.704, 10),
      admitted: false,
      highPriority: false,
    });
  });

  test('breaks value ties by page number', () => {
    const ranked = rankByComplexity(
      [complexity(12, 0.7), complexity(10, 0.7)],
      20,
      'NORMAL',
    );

    expect(ranked.map((candidate) => candidate.pageNumber)).toEqual([10, 12]);
  });
});
