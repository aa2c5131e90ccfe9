import type { PageVisualAnalysis } from '@pagewise/model';

import { z } from 'zod';

/**
 * Zod schema for the structured output of a page analysis call.
 *
 * Every property is required so that providers with strict structured
 * output (OpenAI) accept the generated JSON schema.
 */
export const pageVisualAnalysisSchema = z.object({
  pageType: z
    .string()
    .describe('Role of the slide, e.g. "financial projections"'),
  visualElements: z
    .array(z.string())
    .describe('Charts, tables, diagrams and images on the page'),
  dataPoints: z
    .array(
      z.object({
        label: z.string().describe('What the figure measures'),
        value: z.string().describe('The figure as shown, units included'),
        context: z
          .string()
          .describe('Where the figure appears (chart, table, callout)'),
      }),
    )
    .describe('Figures read off the page'),
  insights: z.array(z.string()).describe('Key takeaways for an investor'),
  layoutSummary: z.string().describe('One sentence describing the layout'),
  slideReferences: z
    .array(z.string())
    .describe('Citations of the form "Slide N: <finding>"'),
}) satisfies z.ZodType<PageVisualAnalysis>;
