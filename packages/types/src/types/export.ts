/**
 * JSON export document. Transaction keys are the canonical column names.
 */
export interface ExportTransaction {
  'Date': string;
  'Withdrawals': number | null;
  'Deposits': number | null;
  'Payee': string;
  'Description': string;
  'Reference Number': string;
}

export interface ExportDiagnostic {
  row: number;
  page: number;
  action: 'dropped' | 'repaired';
  reason: string;
  message: string;
}

export interface ExportDocument {
  schemaVersion: '1.0.0';
  bankId: string;
  extractor: string;
  source: {
    fileName: string | null;
  };
  generatedAt: string;
  transactions: ExportTransaction[];
  diagnostics: ExportDiagnostic[];
  warnings: string[];
  summary: {
    transactionCount: number;
    totalWithdrawals: number;
    totalDeposits: number;
    droppedRows: number;
    reconciled: boolean | null;
  };
}
