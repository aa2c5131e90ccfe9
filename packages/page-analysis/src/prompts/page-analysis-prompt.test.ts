import { describe, expect, test } from 'vitest';

import {
  PAGE_ANALYSIS_INSTRUCTIONS,
  buildPageAnalysisPrompt,
  inferDocumentType,
} from './page-analysis-prompt';

describe('inferDocumentType', () => {
  test.each([
    ['Acme_Pitch_2025.pdf', 'Pitch Deck'],
    ['series-a-deck.pdf', 'Pitch Deck'],
    ['Financial Projections.pdf', 'Financial Model'],
    ['revenue_model_v3.pdf', 'Financial Model'],
    ['investment-memo.pdf', 'Executive Summary'],
    ['one-page SUMMARY.pdf', 'Executive Summary'],
    ['data-room-index.pdf', 'Investment Document'],
  ])('classifies %s as %s', (fileName, documentType) => {
    expect(inferDocumentType(fileName)).toBe(documentType);
  });

  test('prefers the deck rule over later rules', () => {
    expect(inferDocumentType('deck-financial-model.pdf')).toBe('Pitch Deck');
  });
});

describe('buildPageAnalysisPrompt', () => {
  test('includes context, focus and citation format', () => {
    const prompt = buildPageAnalysisPrompt({
      pdfPath: '/decks/acme.pdf',
      documentType: 'Pitch Deck',
      totalPages: 18,
      pageNumber: 12,
      label: 'financials',
      keywordsFound: ['revenue', 'ebitda'],
    });

    expect(prompt).toBe(
      [
        PAGE_ANALYSIS_INSTRUCTIONS,
        '',
        'ANALYSIS CONTEXT:',
        'Document type: Pitch Deck',
        'Page: 12 of 18',
        'Selected as: financials',
        'Matched terms: revenue, ebitda',
        '',
        'SPECIFIC ANALYSIS REQUEST:',
        'Extract revenue, margins, burn rate, runway and projections. Read exact values and periods off charts and tables.',
        '',
        'Cite findings in slideReferences as "Slide 12: <finding>".',
      ].join('\n'),
    );
  });

  test('omits matched terms for general pages without keywords', () => {
    const prompt = buildPageAnalysisPrompt({
      pdfPath: '/decks/acme.pdf',
      documentType: 'Investment Document',
      totalPages: 40,
      pageNumber: 4,
      label: 'general',
      keywordsFound: [],
    });

    expect(prompt).not.toContain('Matched terms');
    expect(prompt).toContain(
      'Describe the slide purpose and extract any figures, charts or tables it contains.',
    );
  });
});
