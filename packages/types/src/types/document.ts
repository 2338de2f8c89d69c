/**
 * A text run with its position on the page, in PDF units.
 */
export interface TextItem {
  str: string;
  /** Left edge */
  x: number;
  /** Baseline; origin bottom-left, so larger is higher on the page */
  y: number;
  width: number;
  height: number;
  /** 1-indexed */
  page: number;
}

/**
 * One page (or one worksheet) as the loader hands it to extractors.
 */
export interface RawPage {
  pageNumber: number;
  /** `lines` joined with newlines */
  text: string;
  /**
   * Flattened text view, top to bottom. Items on a line are separated by a
   * space, or by a tab where the gap looks like a column break.
   */
  lines: string[];
  /**
   * Grid view. Each grid starts at a detected header row (grid[0]) and keeps
   * the spatial order of rows and cells.
   */
  tables: string[][][];
  /** Positioned text; empty for spreadsheets */
  items: TextItem[];
}

export interface RawDocumentMetadata {
  title?: string | undefined;
  author?: string | undefined;
  creationDate?: string | undefined;
  sheetNames?: string[] | undefined;
}

export interface RawDocument {
  kind: 'pdf' | 'spreadsheet';
  pages: RawPage[];
  totalPages: number;
  encrypted: boolean;
  metadata: RawDocumentMetadata;
  /** Document-level notes, e.g. pages without extractable text */
  warnings: string[];
}
