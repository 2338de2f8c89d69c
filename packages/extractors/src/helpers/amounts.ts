/**
 * Amount token scanning for text layouts.
 */

export type Indicator = 'CR' | 'DR';

export interface AmountToken {
  /** Token as printed, sign and parentheses included, indicator excluded */
  raw: string;
  /** Digits with grouping, no sign */
  magnitude: string;
  /** -1 for a leading minus or parentheses, 1 for a leading plus, 0 when unsigned */
  sign: -1 | 0 | 1;
  indicator: Indicator | undefined;
  /** Offset of the token (sign included) in the scanned text */
  index: number;
  /** Offset just past the token, indicator included */
  end: number;
}

const MAGNITUDE = String.raw`(?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2}`;

const TOKEN_PATTERN = new RegExp(
  `(?<![\\d.,])([-+])?(\\()?(${MAGNITUDE})(\\))?(?!\\d|\\.\\d)(?:\\s*(CR|DR)\\.?(?![A-Za-z]))?`,
  'gi'
);

/**
 * All amount tokens in a line, left to right.
 */
export function findAmountTokens(text: string): AmountToken[] {
  const tokens: AmountToken[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const [full, signChar, open, magnitude, close, indicator] = match;
    if (magnitude === undefined || match.index === undefined) continue;

    const parenthesised = open !== undefined && close !== undefined;
    const sign: -1 | 0 | 1 = signChar === '-' || parenthesised ? -1 : signChar === '+' ? 1 : 0;

    tokens.push({
      raw: parenthesised ? `(${magnitude})` : `${signChar ?? ''}${magnitude}`,
      magnitude,
      sign,
      indicator: toIndicator(indicator),
      index: match.index,
      end: match.index + full.length,
    });
  }
  return tokens;
}

export function toIndicator(value: string | undefined): Indicator | undefined {
  if (value === undefined) return undefined;
  const upper = value.toUpperCase();
  return upper === 'CR' || upper === 'DR' ? upper : undefined;
}

/**
 * Signed value for a token: its own sign if printed, else its indicator
 * (`DR` negative), else unsigned.
 */
export function signedValue(token: AmountToken): string {
  if (token.sign === -1) return `-${token.magnitude}`;
  if (token.indicator === 'DR') return `-${token.magnitude}`;
  return token.magnitude;
}

/**
 * Remove a trailing `Cr`/`Dr` (with or without a dot) from a cell.
 */
export function stripIndicator(cell: string): { value: string; indicator: Indicator | undefined } {
  const match = /^(.*?)\s*\b(CR|DR)\.?$/i.exec(cell.trim());
  if (match?.[1] === undefined) {
    return { value: cell.trim(), indicator: undefined };
  }
  return { value: match[1].trim(), indicator: toIndicator(match[2]) };
}

/**
 * A balance cell: `Dr` marks an overdrawn (negative) balance.
 */
export function balanceCell(cell: string): string {
  const { value, indicator } = stripIndicator(cell);
  if (indicator === 'DR' && value !== '' && !value.startsWith('-')) return `-${value}`;
  return value;
}

/**
 * Remove amount tokens (and their indicators) from a line.
 */
export function stripAmountTokens(text: string, tokens: AmountToken[] = findAmountTokens(text)): string {
  let out = text;
  for (const token of [...tokens].reverse()) {
    out = `${out.slice(0, token.index)} ${out.slice(token.end)}`;
  }
  return out;
}
