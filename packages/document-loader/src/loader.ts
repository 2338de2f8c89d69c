import type { RawDocument } from '@statement-kit/types';
import { UnreadableDocumentError, getConfig } from '@statement-kit/types';
import { sniffFileKind } from './file-kind.js';
import { loadPdf } from './pdf-loader.js';
import { loadCsv, loadWorkbook } from './spreadsheet-loader.js';

export interface LoadOptions {
  /** Defaults to STATEMENT_MAX_PAGES */
  maxPages?: number | undefined;
}

/**
 * Open a statement file: PDF, xlsx/xls workbook or CSV.
 *
 * @throws AuthenticationError when a password is needed or wrong
 * @throws UnreadableDocumentError for unsupported or corrupt files
 */
export async function load(
  file: Uint8Array,
  password?: string,
  options: LoadOptions = {}
): Promise<RawDocument> {
  if (file.length === 0) {
    throw new UnreadableDocumentError('File is empty');
  }

  const maxPages = options.maxPages ?? getConfig().maxPages;
  const kind = sniffFileKind(file);

  switch (kind) {
    case 'pdf':
      return loadPdf(file, { password, maxPages });
    case 'xlsx':
    case 'ole':
      return loadWorkbook(file, { password, maxPages });
    case 'csv':
      return loadCsv(file, { maxPages });
    case 'unknown':
      throw new UnreadableDocumentError('Unsupported file format');
  }
}
