/**
 * Ways to decide whether an unsigned amount left or entered the account.
 */
import { DEFAULT_BALANCE_TOLERANCE } from '@statement-kit/types';

export type Polarity = 'withdrawal' | 'deposit';

/**
 * Direction from the running balance. When the amount is known, an exact
 * step (`previous ± amount = current`) wins over the plain direction.
 */
export function balanceTrendPolarity(
  previous: number | undefined,
  current: number | undefined,
  amount?: number
): Polarity | undefined {
  if (previous === undefined || current === undefined) return undefined;

  if (amount !== undefined) {
    if (Math.abs(previous - amount - current) <= DEFAULT_BALANCE_TOLERANCE) return 'withdrawal';
    if (Math.abs(previous + amount - current) <= DEFAULT_BALANCE_TOLERANCE) return 'deposit';
  }

  if (current < previous) return 'withdrawal';
  if (current > previous) return 'deposit';
  return undefined;
}

export interface KeywordRules {
  deposit: readonly string[];
  withdrawal: readonly string[];
  /** Match keywords only between non-letters ("POS" not inside "DEPOSIT") */
  wholeWords?: boolean;
}

function containsKeyword(upper: string, keyword: string, wholeWords: boolean): boolean {
  if (!wholeWords) return upper.includes(keyword);
  let from = upper.indexOf(keyword);
  while (from >= 0) {
    const before = upper.charAt(from - 1);
    const after = upper.charAt(from + keyword.length);
    if (!/[A-Z]/.test(before) && !/[A-Z]/.test(after)) return true;
    from = upper.indexOf(keyword, from + 1);
  }
  return false;
}

/**
 * Direction from description keywords. Only a one-sided hit decides.
 */
export function keywordPolarity(text: string, rules: KeywordRules): Polarity | undefined {
  const upper = text.toUpperCase();
  const wholeWords = rules.wholeWords ?? false;
  const isDeposit = rules.deposit.some((keyword) => containsKeyword(upper, keyword, wholeWords));
  const isWithdrawal = rules.withdrawal.some((keyword) => containsKeyword(upper, keyword, wholeWords));

  if (isDeposit && !isWithdrawal) return 'deposit';
  if (isWithdrawal && !isDeposit) return 'withdrawal';
  return undefined;
}

/** Hints for layouts with no bank-specific vocabulary. */
export const GENERIC_KEYWORDS: KeywordRules = {
  deposit: ['SALARY', 'REFUND', 'DEPOSIT', 'CREDIT', 'INWARD', 'REVERSAL', 'CASHBACK', 'PROFIT', 'INTEREST PAID'],
  withdrawal: ['PURCHASE', 'POS', 'ATM', 'WITHDRAWAL', 'DEBIT', 'FEE', 'FEES', 'CHARGES', 'PAYMENT', 'VAT', 'OUTWARD'],
  wholeWords: true,
};
