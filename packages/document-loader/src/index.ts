// Entry point
export { load, type LoadOptions } from './loader.js';

// Format-specific loaders
export { loadPdf, buildPages, type PdfLoadOptions } from './pdf-loader.js';
export { loadWorkbook, loadCsv, type SpreadsheetLoadOptions } from './spreadsheet-loader.js';
export { sniffFileKind, isEncryptedWorkbook, type FileKind } from './file-kind.js';

// Layout-aware extraction (pdfjs-dist)
export {
  extractTextItemsFromBuffer,
  toLoaderError,
  type LayoutExtractedPDF,
  type ExtractOptions,
} from './layout-pdfjs.js';

// Layout utilities
export { groupByRows, buildRowText, rowsToLines, type Row } from './layout/rows.js';
export {
  mergeHeaderItems,
  detectColumnsFromHeader,
  getColumnForItem,
  mapRowToColumns,
  type Column,
} from './layout/columns.js';
export { buildTableGrids } from './layout/grid.js';
