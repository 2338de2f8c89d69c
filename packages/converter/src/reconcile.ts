/**
 * Running-balance reconciliation.
 *
 * For consecutive rows that both print a balance:
 *   previous + deposit - withdrawal = current
 * Mismatches are reported, never corrected.
 */
import type { ReconciliationMismatch, ReconciliationResult, Transaction } from '@statement-kit/types';
import { DEFAULT_BALANCE_TOLERANCE, DEFAULT_MIN_RECONCILED_ROWS, roundToTwoDecimals } from '@statement-kit/types';

export interface ReconcileOptions {
  /** Tolerance for balance comparison (default: 0.01) */
  tolerance?: number;
  /** Matched pairs in a row needed to pass */
  minConsecutive?: number;
}

export function reconcileRunningBalance(
  transactions: readonly Transaction[],
  balances: ReadonlyArray<number | null>,
  options: ReconcileOptions = {}
): ReconciliationResult {
  const { tolerance = DEFAULT_BALANCE_TOLERANCE, minConsecutive = DEFAULT_MIN_RECONCILED_ROWS } = options;

  const printed = balances.filter((balance) => balance !== null).length;
  if (printed < 2) {
    return {
      applicable: false,
      passed: false,
      checkedPairs: 0,
      matchedPairs: 0,
      longestMatchedRun: 0,
      tolerance,
      mismatches: [],
    };
  }

  const mismatches: ReconciliationMismatch[] = [];
  let checkedPairs = 0;
  let matchedPairs = 0;
  let run = 0;
  let longestMatchedRun = 0;

  for (let index = 1; index < transactions.length; index++) {
    const previous = balances[index - 1];
    const current = balances[index];
    const transaction = transactions[index];
    if (previous === null || previous === undefined || current === null || current === undefined || transaction === undefined) {
      run = 0;
      continue;
    }

    checkedPairs++;
    const expected = roundToTwoDecimals(previous + (transaction.deposit ?? 0) - (transaction.withdrawal ?? 0));
    const delta = roundToTwoDecimals(current - expected);

    if (Math.abs(delta) <= tolerance) {
      matchedPairs++;
      run++;
      longestMatchedRun = Math.max(longestMatchedRun, run);
    } else {
      mismatches.push({ index, expectedBalance: expected, actualBalance: current, delta });
      run = 0;
    }
  }

  return {
    applicable: true,
    passed: mismatches.length === 0 && longestMatchedRun >= minConsecutive,
    checkedPairs,
    matchedPairs,
    longestMatchedRun,
    tolerance,
    mismatches,
  };
}

/**
 * One-line description of a failed check, for result warnings.
 */
export function describeReconciliation(result: ReconciliationResult, minConsecutive: number): string {
  if (result.mismatches.length > 0) {
    const first = result.mismatches[0];
    const where = first === undefined ? '' : ` (first at row ${first.index}, off by ${first.delta.toFixed(2)})`;
    return `Running balance does not reconcile: ${result.mismatches.length} of ${result.checkedPairs} row pairs differ${where}`;
  }
  return `Running balance reconciled for ${result.longestMatchedRun} consecutive row pairs; ${minConsecutive} required`;
}
