/**
 * CSV Exporter Module
 *
 * Renders an ExtractionResult as CSV in the canonical column order.
 */

import type { DisplayDateFormat, ExtractionResult } from '@statement-kit/types';
import { formatAmount } from '@statement-kit/types';
import { CANONICAL_COLUMNS, toCanonicalRow } from './canonical-row.js';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** 'dmy' (DD-MM-YYYY) or 'iso' (YYYY-MM-DD) (default: 'dmy') */
  dateFormat?: DisplayDateFormat;
}

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
function escapeCsvValue(value: string, delimiter: string): string {
  const needsQuoting =
    value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r');

  if (needsQuoting) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function amountCell(amount: number | null): string {
  return amount === null ? '' : formatAmount(amount);
}

function rowToCsvLine(row: readonly string[], delimiter: string): string {
  return row.map((value) => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Export transactions to CSV, in document order.
 *
 * @returns CSV text without a trailing newline
 */
export function exportCsv(result: ExtractionResult, options: CsvExportOptions = {}): string {
  const opts: Required<CsvExportOptions> = {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    dateFormat: options.dateFormat ?? 'dmy',
  };

  const lines: string[] = [];
  if (opts.includeHeader) {
    lines.push(rowToCsvLine(CANONICAL_COLUMNS, opts.delimiter));
  }

  for (const transaction of result.transactions) {
    const row = toCanonicalRow(transaction, opts.dateFormat);
    lines.push(
      rowToCsvLine(
        [
          row.date,
          amountCell(row.withdrawal),
          amountCell(row.deposit),
          row.payee,
          row.description,
          row.referenceNumber,
        ],
        opts.delimiter
      )
    );
  }

  return lines.join('\n');
}
