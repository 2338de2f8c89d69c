import type { BankId, ExtractorId } from '../types/bank.js';
import type { Diagnostic, ReconciliationResult, Transaction } from './statement.js';

export interface ExtractionStats {
  pages: number;
  rowsSeen: number;
  rowsKept: number;
  rowsDropped: number;
  rowsRepaired: number;
}

/**
 * Outcome of one conversion. Built fresh per request and owned by the caller.
 */
export interface ExtractionResult {
  bankId: BankId;
  /** Extractor that produced the rows; differs from bankId for "other" */
  extractor: ExtractorId;
  transactions: Transaction[];
  /** Printed running balance per transaction, aligned by index */
  balances: Array<number | null>;
  diagnostics: Diagnostic[];
  warnings: string[];
  reconciliation: ReconciliationResult | null;
  stats: ExtractionStats;
  /** True when "other" fell through to the universal extractor */
  fallback: boolean;
  parserVersion: string;
}
