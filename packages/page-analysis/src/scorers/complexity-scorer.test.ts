import { describe, expect, test } from 'vitest';

import { ComplexityScorer } from './complexity-scorer';

describe('ComplexityScorer', () => {
  const scorer = new ComplexityScorer();

  describe('score', () => {
    test('weights the five sub-scores and applies the financial boost', () => {
      const result = scorer.score({
        pageNumber: 8,
        imageCount: 2,
        drawingCount: 5,
        blockCount: 6,
        colorDiversity: 25,
        textAreaRatio: 0.4,
        textContent: 'Revenue grew 3x year over year',
      });

      expect(result.subScores.image).toBeCloseTo(0.6);
      expect(result.subScores.drawing).toBeCloseTo(0.5);
      expect(result.subScores.layout).toBe(0.4);
      expect(result.subScores.color).toBe(0.5);
      expect(result.subScores.textComplement).toBeCloseTo(0.6);
      expect(result.score).toBeCloseTo(0.72);
      expect(result.financialBoost).toBe(true);
      expect(result.requiresVisualAnalysis).toBe(true);
      expect(result.source).toBe('profile');
    });

    test('scores a plain text page as zero', () => {
      const result = scorer.score({
        pageNumber: 2,
        imageCount: 0,
        drawingCount: 0,
        blockCount: 2,
        colorDiversity: 0,
        textAreaRatio: 1,
        textContent: 'Our mission',
      });

      expect(result.score).toBe(0);
      expect(result.requiresVisualAnalysis).toBe(false);
    });

    test('saturates every sub-score at its cap', () => {
      const result = scorer.score({
        pageNumber: 3,
        imageCount: 4,
        drawingCount: 12,
        blockCount: 10,
        colorDiversity: 120,
        textAreaRatio: 0,
        textContent: '',
      });

      expect(result.subScores).toEqual({
        image: 1,
        drawing: 1,
        layout: 0.4,
        color: 1,
        textComplement: 1,
      });
      expect(result.score).toBeCloseTo(0.88);
      expect(result.financialBoost).toBe(false);
      expect(result.requiresVisualAnalysis).toBe(true);
    });

    test('clamps the boosted score to 1', () => {
      const result = scorer.score({
        pageNumber: 3,
        imageCount: 4,
        drawingCount: 12,
        blockCount: 10,
        colorDiversity: 120,
        textAreaRatio: 0,
        textContent: 'Series A funding',
      });

      expect(result.score).toBe(1);
    });

    test('does not boost financial text without images or a chart', () => {
      const result = scorer.score({
        pageNumber: 5,
        imageCount: 0,
        drawingCount: 3,
        blockCount: 1,
        colorDiversity: 0,
        textAreaRatio: 0.5,
        textContent: 'Projected revenue and profit',
      });

      expect(result.financialBoost).toBe(false);
      expect(result.score).toBeCloseTo(0.1);
      expect(result.requiresVisualAnalysis).toBe(false);
    });

    test('forces visual analysis for boosted pages below the threshold', () => {
      const result = scorer.score({
        pageNumber: 12,
        drawingCount: 4,
        textContent: 'MARKET OVERVIEW',
      });

      expect(result.financialBoost).toBe(true);
      expect(result.score).toBeCloseTo(0.35);
      expect(result.requiresVisualAnalysis).toBe(true);
    });

    test('treats missing and malformed fields as zero', () => {
      const result = scorer.score({
        pageNumber: 9,
        imageCount: Number.NaN,
        drawingCount: -5,
        colorDiversity: Number.POSITIVE_INFINITY,
        textAreaRatio: 1.5,
      });

      expect(result.subScores).toEqual({
        image: 0,
        drawing: 0,
        layout: 0,
        color: 0,
        textComplement: 0,
      });
      expect(result.score).toBe(0);
      expect(result.financialBoost).toBe(false);
    });

    test('honors a custom threshold', () => {
      const lenient = new ComplexityScorer({ threshold: 0.05 });

      const result = lenient.score({
        pageNumber: 5,
        drawingCount: 3,
        textAreaRatio: 0.5,
      });

      expect(result.requiresVisualAnalysis).toBe(true);
    });

    test('is deterministic', () => {
      const profile = {
        pageNumber: 4,
        imageCount: 1,
        drawingCount: 7,
        blockCount: 8,
        colorDiversity: 33,
        textAreaRatio: 0.25,
        textContent: 'Valuation',
      };

      expect(scorer.score(profile)).toEqual(scorer.score({ ...profile }));
    });
  });

  describe('fallback', () => {
    test('assigns the fixed fallback score without visual analysis', () => {
      const result = scorer.fallback(14);

      expect(result.pageNumber).toBe(14);
      expect(result.score).toBe(0.3);
      expect(result.requiresVisualAnalysis).toBe(false);
      expect(result.source).toBe('fallback');
    });
  });

  describe('hasFinancialKeyword', () => {
    test('matches case-insensitively', () => {
      expect(ComplexityScorer.hasFinancialKeyword('Key METRICS')).toBe(true);
    });

    test('returns false for empty or unrelated text', () => {
      expect(ComplexityScorer.hasFinancialKeyword(undefined)).toBe(false);
      expect(ComplexityScorer.hasFinancialKeyword('Meet the founders')).toBe(
        false,
      );
    });
  });

  describe('distribution', () => {
    test('buckets scores into high, medium and low bands', () => {
      const scores = [0.9, 0.7, 0.4, 0.39, 0.71].map((score) => ({ score }));

      expect(ComplexityScorer.distribution(scores)).toEqual({
        high: 2,
        medium: 2,
        low: 1,
      });
    });

    test('returns zeros for no pages', () => {
      expect(ComplexityScorer.distribution([])).toEqual({
        high: 0,
        medium: 0,
        low: 0,
      });
    });
  });
});
