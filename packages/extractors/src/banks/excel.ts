import type { ExtractionStrategy, HeaderField } from '@statement-kit/types';
import { SPREADSHEET_HEADER_SEARCH_DEPTH } from '@statement-kit/types';
import { TableExtractor } from '../table-extractor.js';

/**
 * Spreadsheet exports of any bank. Banks put a title block above the table,
 * so the header is searched for further down than in PDF grids.
 */
export class SpreadsheetExtractor extends TableExtractor {
  readonly id = 'excel';
  override readonly strategy: ExtractionStrategy = 'spreadsheet';
  protected readonly signature = null;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description'];
  protected override readonly headerSearchDepth = SPREADSHEET_HEADER_SEARCH_DEPTH;
}
