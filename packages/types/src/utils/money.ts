const CURRENCY_CODES = /(?:AED|USD|EUR|GBP|QAR|SAR|INR|OMR|KWD|BHD|DHS)\.?/gi;
const CURRENCY_SYMBOLS = /[$€£₹]/g;

/**
 * Parse a printed amount. Handles currency codes and symbols, thousands
 * separators, parentheses and trailing minus for negatives, and a decimal
 * comma (`12,50`) when no dot is present.
 */
export function parseAmount(amountStr: string | number): number {
  if (typeof amountStr === 'number') {
    if (!Number.isFinite(amountStr)) {
      throw new Error(`Unable to parse amount: ${amountStr}`);
    }
    return amountStr;
  }

  let cleaned = amountStr
    .replace(CURRENCY_CODES, '')
    .replace(CURRENCY_SYMBOLS, '')
    .replace(/\s+/g, '');

  let negative = false;
  if (/^\(.*\)$/.test(cleaned)) {
    negative = true;
    cleaned = cleaned.slice(1, -1);
  }
  if (cleaned.endsWith('-')) {
    negative = true;
    cleaned = cleaned.slice(0, -1);
  }
  if (cleaned.startsWith('-')) {
    negative = !negative;
    cleaned = cleaned.slice(1);
  } else if (cleaned.startsWith('+')) {
    cleaned = cleaned.slice(1);
  }

  if (!cleaned.includes('.') && /^\d+,\d{2}$/.test(cleaned)) {
    cleaned = cleaned.replace(',', '.');
  } else {
    cleaned = cleaned.replace(/,/g, '');
  }

  if (!/^(?:\d+\.?\d*|\.\d+)$/.test(cleaned)) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const num = parseFloat(cleaned);
  // Long digit runs overflow to Infinity
  if (!Number.isFinite(num)) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  return negative ? -num : num;
}

export function tryParseAmount(amountStr: string | number | undefined): number | undefined {
  if (amountStr === undefined) return undefined;
  try {
    return parseAmount(amountStr);
  } catch {
    return undefined;
  }
}

/** Blank cells and lone dashes mean "no amount", not zero. */
export function isBlankAmount(value: string | number | undefined): boolean {
  if (value === undefined) return true;
  if (typeof value === 'number') return false;
  const trimmed = value.trim();
  return trimmed === '' || /^[-–—]+$/.test(trimmed);
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

/** Two decimals, no grouping: the form exports write. */
export function formatAmount(amount: number): string {
  return roundToTwoDecimals(amount).toFixed(2);
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}
