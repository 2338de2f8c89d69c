/**
 * JSON export document, validated against the export schema before it is
 * handed out.
 */
import type { ExportDocument, ExportTransaction, ExtractionResult } from '@statement-kit/types';
import { assertValidExportDocument, sumAmounts } from '@statement-kit/types';

export interface JsonExportOptions {
  /** Original file name, recorded under `source` */
  fileName?: string;
  /** Timestamp to record (default: now) */
  generatedAt?: Date;
}

export function toExportDocument(result: ExtractionResult, options: JsonExportOptions = {}): ExportDocument {
  const transactions: ExportTransaction[] = result.transactions.map((transaction) => ({
    'Date': transaction.date,
    'Withdrawals': transaction.withdrawal ?? null,
    'Deposits': transaction.deposit ?? null,
    'Payee': transaction.payee,
    'Description': transaction.description,
    'Reference Number': transaction.referenceNumber,
  }));

  const document: ExportDocument = {
    schemaVersion: '1.0.0',
    bankId: result.bankId,
    extractor: result.extractor,
    source: { fileName: options.fileName ?? null },
    generatedAt: (options.generatedAt ?? new Date()).toISOString(),
    transactions,
    diagnostics: result.diagnostics.map(({ row, page, action, reason, message }) => ({
      row,
      page,
      action,
      reason,
      message,
    })),
    warnings: [...result.warnings],
    summary: {
      transactionCount: transactions.length,
      totalWithdrawals: sumAmounts(result.transactions.map((transaction) => transaction.withdrawal ?? 0)),
      totalDeposits: sumAmounts(result.transactions.map((transaction) => transaction.deposit ?? 0)),
      droppedRows: result.stats.rowsDropped,
      reconciled: result.reconciliation?.applicable === true ? result.reconciliation.passed : null,
    },
  };

  assertValidExportDocument(document);
  return document;
}

export function exportJson(result: ExtractionResult, options: JsonExportOptions = {}): string {
  return JSON.stringify(toExportDocument(result, options), null, 2);
}
