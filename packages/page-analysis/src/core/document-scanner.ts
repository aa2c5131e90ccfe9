import type { LoggerMethods } from '@pagewise/logger';
import type {
  DocumentScan,
  PageExtractionStatus,
  PageScanEntry,
  PageStructuralProfile,
} from '@pagewise/model';

import type { PdfReader } from '../types/collaborators';

import { ConcurrentPool } from '@pagewise/shared';

import { PAGE_ANALYSIS_PIPELINE } from '../config/constants';
import { PdfReadError } from '../errors/pdf-read-error';
import { CategoryScorer } from '../scorers/category-scorer';
import { ComplexityScorer } from '../scorers/complexity-scorer';

/** Options for DocumentScanner */
export interface DocumentScannerOptions {
  /** Pages read at the same time (default: 4) */
  concurrency?: number;
}

function extractionStatus(
  profileRead: boolean,
  textRead: boolean,
): PageExtractionStatus {
  if (profileRead && textRead) return 'ok';
  if (textRead) return 'profile-failed';
  if (profileRead) return 'text-failed';
  return 'failed';
}

/**
 * Reads every page of a document and scores it.
 *
 * Page-level reader failures never abort the scan: each page carries an
 * explicit extraction status, pages without a profile get the fallback
 * complexity score, and layout text missing on a page falls back to the
 * profile's words. Pages with no readable text score zero on every category.
 * Only a failure to read the page count is thrown.
 */
export class DocumentScanner {
  private readonly concurrency: number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly reader: PdfReader,
    private readonly complexityScorer: ComplexityScorer,
    private readonly categoryScorer: CategoryScorer,
    options?: DocumentScannerOptions,
  ) {
    this.concurrency =
      options?.concurrency ?? PAGE_ANALYSIS_PIPELINE.SCAN_CONCURRENCY;
  }

  /**
   * @throws PdfReadError when the page count cannot be read
   */
  async scan(pdfPath: string): Promise<DocumentScan> {
    const startedAt = Date.now();

    const totalPages = await this.reader
      .getPageCount(pdfPath)
      .catch((error: unknown) => {
        throw error instanceof PdfReadError
          ? error
          : PdfReadError.fromError(
              `[DocumentScanner] Failed to read page count of ${pdfPath}`,
              error,
            );
      });

    this.logger.info(`[DocumentScanner] Scanning ${totalPages} pages...`);

    const pageNumbers = Array.from({ length: totalPages }, (_, i) => i + 1);
    const pages = await ConcurrentPool.run(
      pageNumbers,
      this.concurrency,
      (pageNumber) => this.scanPage(pdfPath, pageNumber),
    );

    const degradedPages = pages
      .filter((page) => page.extraction !== 'ok')
      .map((page) => page.pageNumber);
    const complexityDistribution = ComplexityScorer.distribution(
      pages.map((page) => page.complexity),
    );
    const elapsedMs = Date.now() - startedAt;

    this.logger.info(
      `[DocumentScanner] Scanned ${totalPages} pages in ${elapsedMs}ms (${degradedPages.length} degraded)`,
    );
    this.logger.info(
      `[DocumentScanner] Complexity: ${complexityDistribution.high} high, ${complexityDistribution.medium} medium, ${complexityDistribution.low} low`,
    );

    return {
      pdfPath,
      totalPages,
      pages,
      degradedPages,
      complexityDistribution,
      elapsedMs,
    };
  }

  private async scanPage(
    pdfPath: string,
    pageNumber: number,
  ): Promise<PageScanEntry> {
    const [profileResult, textResult] = await Promise.allSettled([
      this.reader.getPageStructuralProfile(pdfPath, pageNumber),
      this.reader.getPageText(pdfPath, pageNumber),
    ]);

    const errors: string[] = [];
    let profile: PageStructuralProfile | undefined;
    let text = '';

    if (profileResult.status === 'fulfilled') {
      profile = profileResult.value;
      text = profile.textContent;
    } else {
      errors.push(PdfReadError.getErrorMessage(profileResult.reason));
    }

    if (textResult.status === 'fulfilled') {
      text = textResult.value;
    } else {
      errors.push(PdfReadError.getErrorMessage(textResult.reason));
    }

    const extraction = extractionStatus(
      profileResult.status === 'fulfilled',
      textResult.status === 'fulfilled',
    );
    if (extraction !== 'ok') {
      this.logger.warn(
        `[DocumentScanner] Page ${pageNumber} extraction ${extraction}: ${errors.join('; ')}`,
      );
    }

    const complexity = profile
      ? this.complexityScorer.score({ ...profile, textContent: text })
      : this.complexityScorer.fallback(pageNumber);
    const category = this.categoryScorer.score(pageNumber, text);

    this.logger.debug(
      `[DocumentScanner] Page ${pageNumber}: complexity ${complexity.score.toFixed(2)}, category ${category.primaryCategory ?? 'none'} (${category.totalScore.toFixed(1)})`,
    );

    return {
      pageNumber,
      extraction,
      errors,
      ...(profile ? { profile } : {}),
      complexity,
      category,
      textPreview: CategoryScorer.preview(text),
    };
  }
}
