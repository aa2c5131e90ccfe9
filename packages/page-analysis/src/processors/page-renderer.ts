import type { LoggerMethods } from '@pagewise/logger';
import type { RenderedPageImage } from '@pagewise/model';

import type {
  PageImageRenderer,
  RenderPageOptions,
} from '../types/collaborators';

import { spawnAsync } from '@pagewise/shared';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { PAGE_RENDERING } from '../config/constants';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Width and height from a PNG's IHDR chunk.
 *
 * @throws Error when the bytes are not a PNG
 */
export function readPngDimensions(data: Buffer): {
  width: number;
  height: number;
} {
  const isPng =
    data.length >= 24 &&
    PNG_SIGNATURE.every((byte, i) => data[i] === byte) &&
    data.toString('ascii', 12, 16) === 'IHDR';

  if (!isPng) {
    throw new Error('[PageRenderer] Rendered file is not a PNG image');
  }

  return { width: data.readUInt32BE(16), height: data.readUInt32BE(20) };
}

/**
 * Renders single PDF pages to PNG images using ImageMagick.
 *
 * The page is flattened onto a white background and scaled down so its
 * longest edge fits `maxDimension`; smaller pages are left as rendered.
 *
 * ## System Requirements
 * - ImageMagick (`brew install imagemagick`)
 * - Ghostscript (`brew install ghostscript`)
 */
export class PageRenderer implements PageImageRenderer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Render one page.
   *
   * @throws Error when ImageMagick fails or produces no PNG
   */
  async renderPage(
    pdfPath: string,
    pageNumber: number,
    options?: RenderPageOptions,
  ): Promise<RenderedPageImage> {
    const dpi = options?.dpi ?? PAGE_RENDERING.DEFAULT_DPI;
    const maxDimension =
      options?.maxDimension ?? PAGE_RENDERING.DEFAULT_MAX_DIMENSION;

    const workDir = mkdtempSync(join(tmpdir(), 'pagewise-render-'));
    const outputPath = join(workDir, `page_${pageNumber}.png`);

    try {
      const result = await spawnAsync('magick', [
        '-density',
        dpi.toString(),
        `${pdfPath}[${pageNumber - 1}]`,
        '-background',
        'white',
        '-alpha',
        'remove',
        '-alpha',
        'off',
        '-resize',
        `${maxDimension}x${maxDimension}>`,
        outputPath,
      ]);

      if (result.code !== 0) {
        throw new Error(
          `[PageRenderer] Failed to render page ${pageNumber}: ${result.stderr || 'Unknown error'}`,
        );
      }

      const data = readFileSync(outputPath);
      const { width, height } = readPngDimensions(data);
      const sizeKb = data.length / 1024;

      this.logger.debug(
        `[PageRenderer] Rendered page ${pageNumber} at ${dpi} DPI (${width}x${height}, ${sizeKb.toFixed(1)}KB)`,
      );

      return {
        pageNumber,
        data,
        mimeType: 'image/png',
        width,
        height,
        sizeKb,
        dpi,
      };
    } finally {
      rmSync(workDir, { recursive: true, force: true });
    }
  }
}
