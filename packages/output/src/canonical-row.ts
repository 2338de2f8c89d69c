/**
 * The six export columns, in the order every format renders them.
 */
import type { DisplayDateFormat, Transaction } from '@statement-kit/types';
import { CANONICAL_COLUMNS, formatDisplayDate } from '@statement-kit/types';

export { CANONICAL_COLUMNS };

export interface CanonicalRow {
  date: string;
  withdrawal: number | null;
  deposit: number | null;
  payee: string;
  description: string;
  referenceNumber: string;
}

export function toCanonicalRow(transaction: Transaction, dateFormat: DisplayDateFormat): CanonicalRow {
  return {
    date: formatDisplayDate(transaction.date, dateFormat),
    withdrawal: transaction.withdrawal ?? null,
    deposit: transaction.deposit ?? null,
    payee: transaction.payee,
    description: transaction.description,
    referenceNumber: transaction.referenceNumber,
  };
}
