/**
 * XLSX export through SheetJS. Amount cells are numbers so spreadsheet
 * formulas work on them; absent sides stay empty.
 */
import * as XLSX from 'xlsx';
import type { DisplayDateFormat, ExtractionResult } from '@statement-kit/types';
import { CANONICAL_COLUMNS, toCanonicalRow } from './canonical-row.js';

export interface WorkbookExportOptions {
  /** Worksheet name (default: 'Transactions') */
  sheetName?: string;
  /** Date cell text (default: 'dmy') */
  dateFormat?: DisplayDateFormat;
}

type Cell = string | number | null;

export function exportWorkbook(result: ExtractionResult, options: WorkbookExportOptions = {}): Buffer {
  const sheetName = options.sheetName ?? 'Transactions';
  const dateFormat = options.dateFormat ?? 'dmy';

  const matrix: Cell[][] = [[...CANONICAL_COLUMNS]];
  for (const transaction of result.transactions) {
    const row = toCanonicalRow(transaction, dateFormat);
    matrix.push([row.date, row.withdrawal, row.deposit, row.payee, row.description, row.referenceNumber]);
  }

  const sheet = XLSX.utils.aoa_to_sheet(matrix);
  sheet['!cols'] = [{ wch: 12 }, { wch: 14 }, { wch: 14 }, { wch: 28 }, { wch: 48 }, { wch: 20 }];

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, sheetName);

  const written: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(written)) {
    throw new Error('SheetJS did not return a buffer for an xlsx workbook');
  }
  return written;
}
