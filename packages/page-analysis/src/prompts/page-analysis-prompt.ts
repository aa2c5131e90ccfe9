import type { DocumentType, SelectionLabel } from '@pagewise/model';

import type { PageAnalysisContext } from '../types/collaborators';

/**
 * System-level framing shared by every page analysis call
 */
export const PAGE_ANALYSIS_INSTRUCTIONS = `You are a document analysis expert extracting visual content from business documents.
Focus on information that text extraction alone would miss:
- Data visualizations and their key insights
- Complex tables and structured information
- Charts and graphs with specific values and trends
- Visual layouts that provide context
- Images or diagrams with business relevance`;

/**
 * What to look for on a page, by the label it was selected under
 */
const FOCUS_BY_LABEL: Record<SelectionLabel, string> = {
  financials:
    'Extract revenue, margins, burn rate, runway and projections. Read exact values and periods off charts and tables.',
  competition:
    'Identify named competitors, positioning axes and the claimed differentiation. Transcribe comparison tables cell by cell.',
  market:
    'Extract market size figures (TAM, SAM, SOM), growth rates, sources and the segmentation shown.',
  traction:
    'Extract customer counts, revenue milestones, growth curves, retention figures and notable logos or partnerships.',
  team: 'List the people shown with their roles and the prior companies or credentials highlighted.',
  general:
    'Describe the slide purpose and extract any figures, charts or tables it contains.',
};

/**
 * Infer the document type from its file name.
 */
export function inferDocumentType(fileName: string): DocumentType {
  const name = fileName.toLowerCase();
  if (name.includes('deck') || name.includes('pitch')) return 'Pitch Deck';
  if (name.includes('financial') || name.includes('model')) {
    return 'Financial Model';
  }
  if (name.includes('memo') || name.includes('summary')) {
    return 'Executive Summary';
  }
  return 'Investment Document';
}

/**
 * Build the per-page prompt from the selection label, the page position
 * and the document context.
 */
export function buildPageAnalysisPrompt(context: PageAnalysisContext): string {
  const lines = [
    PAGE_ANALYSIS_INSTRUCTIONS,
    '',
    'ANALYSIS CONTEXT:',
    `Document type: ${context.documentType}`,
    `Page: ${context.pageNumber} of ${context.totalPages}`,
    `Selected as: ${context.label}`,
  ];

  if (context.keywordsFound.length > 0) {
    lines.push(`Matched terms: ${context.keywordsFound.join(', ')}`);
  }

  lines.push(
    '',
    'SPECIFIC ANALYSIS REQUEST:',
    FOCUS_BY_LABEL[context.label],
    '',
    `Cite findings in slideReferences as "Slide ${context.pageNumber}: <finding>".`,
  );

  return lines.join('\n');
}
