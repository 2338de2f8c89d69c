import { z } from 'zod';
import { isValidISODate } from '../utils/date.js';

const ISODateSchema = z.string().refine(isValidISODate, { message: 'Expected a YYYY-MM-DD calendar date' });

const PositiveAmountSchema = z.number().positive().finite();

/**
 * Canonical transaction row. Exactly one side carries a positive amount.
 */
export const TransactionSchema = z
  .object({
    date: ISODateSchema,
    withdrawal: PositiveAmountSchema.optional(),
    deposit: PositiveAmountSchema.optional(),
    payee: z.string(),
    description: z.string(),
    referenceNumber: z.string(),
  })
  .refine((tx) => (tx.withdrawal === undefined) !== (tx.deposit === undefined), {
    message: 'Exactly one of withdrawal or deposit must be present',
  });

export const DiagnosticReasonSchema = z.enum([
  'invalid-date',
  'invalid-amount',
  'missing-amount',
  'conflicting-amounts',
  'unresolved-polarity',
  'negative-amount',
  'balance-disambiguated',
]);

export const DiagnosticSchema = z.object({
  row: z.number().int().nonnegative(),
  page: z.number().int().positive(),
  action: z.enum(['dropped', 'repaired']),
  reason: DiagnosticReasonSchema,
  message: z.string(),
  source: z.string(),
});

export const ReconciliationMismatchSchema = z.object({
  index: z.number().int().nonnegative(),
  expectedBalance: z.number(),
  actualBalance: z.number(),
  delta: z.number(),
});

export const ReconciliationResultSchema = z.object({
  applicable: z.boolean(),
  passed: z.boolean(),
  checkedPairs: z.number().int().nonnegative(),
  matchedPairs: z.number().int().nonnegative(),
  longestMatchedRun: z.number().int().nonnegative(),
  tolerance: z.number().nonnegative(),
  mismatches: z.array(ReconciliationMismatchSchema),
});

export type Transaction = z.infer<typeof TransactionSchema>;
export type DiagnosticReason = z.infer<typeof DiagnosticReasonSchema>;
export type Diagnostic = z.infer<typeof DiagnosticSchema>;
export type ReconciliationMismatch = z.infer<typeof ReconciliationMismatchSchema>;
export type ReconciliationResult = z.infer<typeof ReconciliationResultSchema>;
