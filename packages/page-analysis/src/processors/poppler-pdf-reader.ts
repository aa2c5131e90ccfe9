import type { LoggerMethods } from '@pagewise/logger';
import type { PageStructuralProfile } from '@pagewise/model';

import type { PdfReader } from '../types/collaborators';

import { spawnAsync } from '@pagewise/shared';
import { clamp } from 'es-toolkit';

import { PAGE_RENDERING } from '../config/constants';
import { PdfReadError } from '../errors/pdf-read-error';

const BLOCK_PATTERN =
  /<block xMin="([\d.]+)" yMin="([\d.]+)" xMax="([\d.]+)" yMax="([\d.]+)">/g;
const PAGE_SIZE_PATTERN = /<page width="([\d.]+)" height="([\d.]+)">/;
const WORD_PATTERN = /<word[^>]*>([^<]*)<\/word>/g;
const DEFS_PATTERN = /<defs>[\s\S]*?<\/defs>/g;
const SHAPE_PATTERN = /<(?:path|rect|circle|ellipse|line|polyline|polygon)\b/g;

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
  '&#39;': "'",
};

/** Text layout facts read from `pdftotext -bbox-layout` */
interface TextLayout {
  blockCount: number;
  textAreaRatio: number;
  text: string;
}

/**
 * PdfReader backed by command-line tools.
 *
 * Page count and text come from Poppler (`pdfinfo`, `pdftotext`), embedded
 * images from `pdfimages -list`, vector drawings from the `pdftocairo` SVG
 * output and color diversity from ImageMagick.
 *
 * ## System Requirements
 * - Poppler utils (`brew install poppler`)
 * - ImageMagick (`brew install imagemagick`)
 * - Ghostscript (`brew install ghostscript`)
 */
export class PopplerPdfReader implements PdfReader {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Page count reported by pdfinfo.
   *
   * @throws PdfReadError when pdfinfo fails or reports no page count
   */
  async getPageCount(pdfPath: string): Promise<number> {
    const stdout = await this.run('pdfinfo', [pdfPath]);
    const match = stdout.match(/^Pages:\s+(\d+)/m);
    if (!match) {
      throw new PdfReadError(
        `[PopplerPdfReader] pdfinfo reported no page count for ${pdfPath}`,
      );
    }
    return parseInt(match[1], 10);
  }

  /**
   * Layout-preserving text of one page.
   */
  async getPageText(pdfPath: string, pageNumber: number): Promise<string> {
    return this.run(
      'pdftotext',
      [...this.pageRange(pageNumber), '-layout', pdfPath, '-'],
      pageNumber,
    );
  }

  /**
   * Structural profile of one page. Runs the tools for the page
   * concurrently; any tool failure fails the whole profile.
   */
  async getPageStructuralProfile(
    pdfPath: string,
    pageNumber: number,
  ): Promise<PageStructuralProfile> {
    const [layout, imageCount, drawingCount, colorDiversity] =
      await Promise.all([
        this.readTextLayout(pdfPath, pageNumber),
        this.countImages(pdfPath, pageNumber),
        this.countDrawings(pdfPath, pageNumber),
        this.countColors(pdfPath, pageNumber),
      ]);

    this.logger.debug(
      `[PopplerPdfReader] Page ${pageNumber}: ${imageCount} images, ${drawingCount} drawings, ${layout.blockCount} text blocks, ${colorDiversity} colors`,
    );

    return {
      pageNumber,
      imageCount,
      drawingCount,
      textAreaRatio: layout.textAreaRatio,
      colorDiversity,
      blockCount: layout.blockCount + imageCount,
      textContent: layout.text,
    };
  }

  private async readTextLayout(
    pdfPath: string,
    pageNumber: number,
  ): Promise<TextLayout> {
    const html = await this.run(
      'pdftotext',
      [...this.pageRange(pageNumber), '-bbox-layout', pdfPath, '-'],
      pageNumber,
    );

    const pageSize = html.match(PAGE_SIZE_PATTERN);
    const pageArea = pageSize
      ? parseFloat(pageSize[1]) * parseFloat(pageSize[2])
      : 0;

    let blockCount = 0;
    let blockArea = 0;
    for (const [, xMin, yMin, xMax, yMax] of html.matchAll(BLOCK_PATTERN)) {
      blockCount++;
      blockArea +=
        (parseFloat(xMax) - parseFloat(xMin)) *
        (parseFloat(yMax) - parseFloat(yMin));
    }

    const words = Array.from(html.matchAll(WORD_PATTERN), ([, word]) =>
      word.replace(/&(?:amp|lt|gt|quot|apos|#39);/g, (e) => XML_ENTITIES[e]),
    );

    return {
      blockCount,
      textAreaRatio: pageArea > 0 ? clamp(blockArea / pageArea, 0, 1) : 0,
      text: words.join(' '),
    };
  }

  /** Embedded raster images; soft masks and stencils are not counted */
  private async countImages(
    pdfPath: string,
    pageNumber: number,
  ): Promise<number> {
    const stdout = await this.run(
      'pdfimages',
      [...this.pageRange(pageNumber), '-list', pdfPath],
      pageNumber,
    );

    return stdout
      .split('\n')
      .slice(2)
      .filter((line) => line.trim().split(/\s+/)[2] === 'image').length;
  }

  /** Shapes drawn on the page, excluding glyph and pattern definitions */
  private async countDrawings(
    pdfPath: string,
    pageNumber: number,
  ): Promise<number> {
    const svg = await this.run(
      'pdftocairo',
      [...this.pageRange(pageNumber), '-svg', pdfPath, '-'],
      pageNumber,
    );

    return svg.replace(DEFS_PATTERN, '').match(SHAPE_PATTERN)?.length ?? 0;
  }

  private async countColors(
    pdfPath: string,
    pageNumber: number,
  ): Promise<number> {
    const stdout = await this.run(
      'magick',
      [
        '-density',
        PAGE_RENDERING.COLOR_SAMPLE_DPI.toString(),
        `${pdfPath}[${pageNumber - 1}]`,
        '-format',
        '%k',
        'info:',
      ],
      pageNumber,
    );

    const colors = parseInt(stdout.trim(), 10);
    return Number.isFinite(colors)
      ? Math.min(colors, PAGE_RENDERING.MAX_COLOR_DIVERSITY)
      : 0;
  }

  private pageRange(pageNumber: number): string[] {
    return ['-f', pageNumber.toString(), '-l', pageNumber.toString()];
  }

  /**
   * Run a tool and return its stdout.
   *
   * @throws PdfReadError when the tool cannot start or exits non-zero
   */
  private async run(
    command: string,
    args: string[],
    pageNumber?: number,
  ): Promise<string> {
    const where = pageNumber === undefined ? '' : ` for page ${pageNumber}`;

    const result = await spawnAsync(command, args).catch((error: unknown) => {
      throw PdfReadError.fromError(
        `[PopplerPdfReader] Failed to start ${command}${where}`,
        error,
        pageNumber,
      );
    });

    if (result.code !== 0) {
      throw new PdfReadError(
        `[PopplerPdfReader] ${command} failed${where}: ${result.stderr || 'Unknown error'}`,
        pageNumber,
      );
    }
    return result.stdout;
  }
}
