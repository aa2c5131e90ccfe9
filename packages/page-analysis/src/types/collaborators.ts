import type {
  DocumentType,
  PageStructuralProfile,
  RenderedPageImage,
  SelectionLabel,
  VisualAnalysisOutcome,
} from '@pagewise/model';

/**
 * Reads page counts, structural profiles and text from PDF files.
 *
 * Implementations may throw; the scanner turns failures into explicit
 * extraction outcomes.
 */
export interface PdfReader {
  getPageCount(pdfPath: string): Promise<number>;
  getPageStructuralProfile(
    pdfPath: string,
    pageNumber: number,
  ): Promise<PageStructuralProfile>;
  getPageText(pdfPath: string, pageNumber: number): Promise<string>;
}

/** Options for rendering a single page */
export interface RenderPageOptions {
  /** Rendering density (default: 150) */
  dpi?: number;
  /** Longest edge of the output image in pixels (default: 2048) */
  maxDimension?: number;
}

/**
 * Renders one page of a PDF to an image. May throw.
 */
export interface PageImageRenderer {
  renderPage(
    pdfPath: string,
    pageNumber: number,
    options?: RenderPageOptions,
  ): Promise<RenderedPageImage>;
}

/**
 * What an analyzer knows about the page beyond its image
 */
export interface PageAnalysisContext {
  pdfPath: string;
  documentType: DocumentType;
  totalPages: number;
  pageNumber: number;
  /** Category (or 'general') the page was selected under */
  label: SelectionLabel;
  /** Keywords that matched the page's text, for prompting */
  keywordsFound: string[];
}

export interface VisualAnalysisRequest {
  image: RenderedPageImage;
  prompt: string;
  context: PageAnalysisContext;
  abortSignal?: AbortSignal;
}

/**
 * Submits a page image with a prompt and returns structured analysis plus
 * the cost actually incurred.
 *
 * Implementations never throw: failures, timeouts included, come back as
 * an unsuccessful outcome.
 */
export interface VisualAnalyzer {
  analyze(request: VisualAnalysisRequest): Promise<VisualAnalysisOutcome>;
}
