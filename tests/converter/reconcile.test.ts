import { describe, it, expect } from 'vitest';
import { describeReconciliation, reconcileRunningBalance } from '@statement-kit/converter';
import type { Transaction } from '@statement-kit/types';

function tx(side: 'withdrawal' | 'deposit', value: number): Transaction {
  const base = { date: '2024-02-01', payee: '', description: '', referenceNumber: '' };
  return side === 'withdrawal' ? { ...base, withdrawal: value } : { ...base, deposit: value };
}

const TRANSACTIONS = [tx('deposit', 100), tx('withdrawal', 200), tx('deposit', 50), tx('withdrawal', 25)];

describe('reconcileRunningBalance', () => {
  it('passes when enough consecutive pairs match', () => {
    const result = reconcileRunningBalance(TRANSACTIONS, [1000, 800, 850, 825], { minConsecutive: 3 });

    expect(result).toEqual({
      applicable: true,
      passed: true,
      checkedPairs: 3,
      matchedPairs: 3,
      longestMatchedRun: 3,
      tolerance: 0.01,
      mismatches: [],
    });
  });

  it('reports mismatches without correcting them', () => {
    const result = reconcileRunningBalance(TRANSACTIONS, [1000, 800, 850, 800], { minConsecutive: 2 });

    expect(result.passed).toBe(false);
    expect(result.longestMatchedRun).toBe(2);
    expect(result.mismatches).toEqual([{ index: 3, expectedBalance: 825, actualBalance: 800, delta: -25 }]);
    expect(describeReconciliation(result, 2)).toBe(
      'Running balance does not reconcile: 1 of 3 row pairs differ (first at row 3, off by -25.00)'
    );
  });

  it('only compares neighbours that both print a balance', () => {
    const result = reconcileRunningBalance(TRANSACTIONS, [1000, null, 850, 825], { minConsecutive: 3 });

    expect(result.checkedPairs).toBe(1);
    expect(result.matchedPairs).toBe(1);
    expect(result.passed).toBe(false);
    expect(describeReconciliation(result, 3)).toBe('Running balance reconciled for 1 consecutive row pairs; 3 required');
  });

  it('is not applicable with fewer than two balances', () => {
    const result = reconcileRunningBalance(TRANSACTIONS, [null, 800, null, null]);

    expect(result.applicable).toBe(false);
    expect(result.checkedPairs).toBe(0);
  });

  it('accepts differences within the tolerance', () => {
    const result = reconcileRunningBalance([tx('deposit', 10), tx('deposit', 10)], [100, 110.04], {
      tolerance: 0.05,
      minConsecutive: 1,
    });

    expect(result.passed).toBe(true);
  });
});
