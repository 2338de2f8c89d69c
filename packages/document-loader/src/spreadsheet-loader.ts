/**
 * Workbook and CSV loading. Each sheet becomes one page whose single grid is
 * the whole sheet; table extractors find the header row themselves.
 */
import * as XLSX from 'xlsx';
import { parse } from 'csv-parse/sync';
import type { RawDocument, RawPage } from '@statement-kit/types';
import { AuthenticationError, UnreadableDocumentError, logger } from '@statement-kit/types';
import { isEncryptedWorkbook } from './file-kind.js';

export interface SpreadsheetLoadOptions {
  password?: string | undefined;
  maxPages?: number | undefined;
}

const DAY_MS = 24 * 60 * 60 * 1000;
/** Serial day 0 of each workbook date system */
const EPOCH_1900 = Date.UTC(1899, 11, 30);
const EPOCH_1904 = Date.UTC(1904, 0, 1);

function isCell(value: unknown): value is XLSX.CellObject {
  return typeof value === 'object' && value !== null && 't' in value;
}

/** Number formats with a day or year part, ignoring literals and `[...]` sections. */
function isDateFormat(format: XLSX.CellObject['z']): boolean {
  if (typeof format !== 'string') return false;
  const bare = format.replace(/"[^"]*"|\[[^\]]*\]|\\./g, '');
  return /[dy]/i.test(bare);
}

function serialToISO(serial: number, date1904: boolean): string {
  const epoch = date1904 ? EPOCH_1904 : EPOCH_1900;
  return new Date(epoch + Math.floor(serial) * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Date cells become ISO dates whatever their display format; other cells
 * keep the text the sheet shows.
 */
function cellText(cell: XLSX.CellObject, date1904: boolean): string {
  if (cell.t === 'n' && typeof cell.v === 'number' && isDateFormat(cell.z)) {
    return serialToISO(cell.v, date1904);
  }
  if (cell.w !== undefined) return cell.w.trim();
  if (cell.v === undefined || cell.v instanceof Date) return '';
  return String(cell.v).trim();
}

function sheetRows(sheet: XLSX.WorkSheet, date1904: boolean): string[][] {
  const ref = sheet['!ref'];
  if (typeof ref !== 'string') return [];

  const range = XLSX.utils.decode_range(ref);
  const rows: string[][] = [];
  for (let r = range.s.r; r <= range.e.r; r++) {
    const row: string[] = [];
    for (let c = range.s.c; c <= range.e.c; c++) {
      const cell: unknown = sheet[XLSX.utils.encode_cell({ r, c })];
      row.push(isCell(cell) ? cellText(cell, date1904) : '');
    }
    rows.push(row);
  }
  return rows;
}

function toMatrix(rows: string[][]): string[][] {
  return rows
    .map((row) => row.map((cell) => cell.trim()))
    .filter((row) => row.some((cell) => cell !== ''));
}

function matrixToPage(matrix: string[][], pageNumber: number): RawPage {
  const lines = matrix.map((row) => row.filter((cell) => cell !== '').join('\t'));
  return {
    pageNumber,
    text: lines.join('\n'),
    lines,
    tables: [matrix],
    items: [],
  };
}

function toDocument(
  matrices: string[][][],
  sheetNames: string[],
  encrypted: boolean,
  maxPages: number | undefined
): RawDocument {
  if (maxPages !== undefined && matrices.length > maxPages) {
    throw new UnreadableDocumentError(
      `Workbook has ${matrices.length} sheets; the limit is ${maxPages}`,
      'Split the workbook into smaller files'
    );
  }

  const warnings: string[] = [];
  matrices.forEach((matrix, index) => {
    if (matrix.length === 0) {
      warnings.push(`Sheet "${sheetNames[index] ?? index + 1}" is empty`);
    }
  });

  if (matrices.every((matrix) => matrix.length === 0)) {
    throw new UnreadableDocumentError('Spreadsheet contains no data');
  }

  return {
    kind: 'spreadsheet',
    pages: matrices.map((matrix, index) => matrixToPage(matrix, index + 1)),
    totalPages: matrices.length,
    encrypted,
    metadata: { sheetNames },
    warnings,
  };
}

/**
 * Load an .xlsx or .xls workbook. A password only matters for an encrypted
 * container; plain workbooks ignore it.
 */
export function loadWorkbook(bytes: Uint8Array, options: SpreadsheetLoadOptions = {}): RawDocument {
  const encrypted = isEncryptedWorkbook(bytes);
  const password = options.password === '' ? undefined : options.password;
  if (encrypted && password === undefined) {
    throw new AuthenticationError('missing');
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(Buffer.from(bytes), {
      type: 'buffer',
      password: encrypted ? password : undefined,
      cellDates: false,
      cellNF: true,
    });
  } catch (error) {
    if (encrypted) {
      throw new AuthenticationError('incorrect', { cause: error });
    }
    throw new UnreadableDocumentError(
      `Workbook could not be read: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error }
    );
  }

  const date1904 = workbook.Workbook?.WBProps?.date1904 === true;
  const matrices = workbook.SheetNames.map((name) => {
    const sheet = workbook.Sheets[name];
    return sheet === undefined ? [] : toMatrix(sheetRows(sheet, date1904));
  });

  logger.debug('Workbook loaded', { sheets: workbook.SheetNames.length, encrypted });
  return toDocument(matrices, workbook.SheetNames, encrypted, options.maxPages);
}

/**
 * Load a CSV export. Byte-order marks and ragged rows are accepted.
 */
export function loadCsv(bytes: Uint8Array, options: SpreadsheetLoadOptions = {}): RawDocument {
  let rows: string[][];
  try {
    rows = parse(Buffer.from(bytes).toString('utf8'), {
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new UnreadableDocumentError(
      `CSV could not be read: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error }
    );
  }

  logger.debug('CSV loaded', { rows: rows.length });
  return toDocument([toMatrix(rows)], ['Sheet1'], false, options.maxPages);
}
