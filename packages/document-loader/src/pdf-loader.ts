import type { RawDocument, RawPage, TextItem } from '@statement-kit/types';
import { logger } from '@statement-kit/types';
import { extractTextItemsFromBuffer } from './layout-pdfjs.js';
import { buildTableGrids } from './layout/grid.js';
import { groupByRows, rowsToLines } from './layout/rows.js';

const ROW_Y_TOLERANCE = 3;

export interface PdfLoadOptions {
  password?: string | undefined;
  maxPages?: number | undefined;
}

/**
 * Build the page views (lines and grids) from positioned items.
 * Exposed separately so layouts can be tested without a PDF file.
 */
export function buildPages(items: TextItem[], totalPages: number): { pages: RawPage[]; warnings: string[] } {
  const pages: RawPage[] = [];
  const warnings: string[] = [];

  for (let pageNumber = 1; pageNumber <= totalPages; pageNumber++) {
    const pageItems = items.filter((item) => item.page === pageNumber);
    if (pageItems.length === 0) {
      warnings.push(`Page ${pageNumber} has no extractable text (scanned image?)`);
    }

    const rows = groupByRows(pageItems, ROW_Y_TOLERANCE);
    const lines = rowsToLines(rows);
    pages.push({
      pageNumber,
      text: lines.join('\n'),
      lines,
      tables: buildTableGrids(rows),
      items: pageItems,
    });
  }

  return { pages, warnings };
}

export async function loadPdf(bytes: Uint8Array, options: PdfLoadOptions = {}): Promise<RawDocument> {
  const extracted = await extractTextItemsFromBuffer(bytes, options);
  const { pages, warnings } = buildPages(extracted.items, extracted.totalPages);

  logger.debug('PDF loaded', {
    pages: extracted.totalPages,
    items: extracted.items.length,
    tables: pages.reduce((sum, page) => sum + page.tables.length, 0),
  });

  return {
    kind: 'pdf',
    pages,
    totalPages: extracted.totalPages,
    encrypted: extracted.encrypted,
    metadata: extracted.metadata,
    warnings,
  };
}
