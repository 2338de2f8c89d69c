export {
  TransactionSchema,
  DiagnosticSchema,
  DiagnosticReasonSchema,
  ReconciliationResultSchema,
  ReconciliationMismatchSchema,
  type Transaction,
  type Diagnostic,
  type DiagnosticReason,
  type ReconciliationResult,
  type ReconciliationMismatch,
} from './statement.js';
export type { ExtractionResult, ExtractionStats } from './extraction-result.js';
