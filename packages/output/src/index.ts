/**
 * Output module - renders extraction results in the canonical columns.
 */

export { CANONICAL_COLUMNS, toCanonicalRow, type CanonicalRow } from './canonical-row.js';
export { exportCsv, type CsvExportOptions } from './csv-exporter.js';
export { exportWorkbook, type WorkbookExportOptions } from './workbook-exporter.js';
export { toExportDocument, exportJson, type JsonExportOptions } from './json-exporter.js';
