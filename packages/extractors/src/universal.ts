/**
 * Universal Extractor
 *
 * Fallback for layouts nobody wrote an extractor for. Reads every page as
 * text, keeps lines that start with a date and takes the amounts printed
 * after it. Never reports a format mismatch: a document without dated
 * lines simply yields nothing.
 */
import type { ExtractionStrategy, RawDocument, RawPage, RawRow } from '@statement-kit/types';
import { ALL_DATE_FORMATS, logger, parseAmount, tryParseDate } from '@statement-kit/types';
import { findAmountTokens, signedValue, stripAmountTokens, type AmountToken } from './helpers/amounts.js';
import { balanceTrendPolarity, GENERIC_KEYWORDS, keywordPolarity, type Polarity } from './helpers/polarity.js';
import { collapseWhitespace, extractReference, stripReferenceLabel } from './helpers/text.js';
import { restartable } from './restartable.js';
import type { Extractor } from './types.js';

const UNIVERSAL_PATTERNS = {
  noise: /\bbalance\b|\bstatement\b|^page\b|\bpage\s+\d+|\biban\b|\baccount\b|\bsummary\b/i,
  openingBalance: /\b(?:opening|previous)\s+balance\b|\bbrought\s+forward\b/i,
  debitHeader: /\b(?:debits?|withdrawals?)\b/i,
  creditHeader: /\b(?:credits?|deposits?)\b/i,
  dateHeader: /\bdate\b/i,
};

/** Longest date token a statement prints, in words (`Feb 01, 2024`). */
const MAX_DATE_WORDS = 3;

interface LeadingDate {
  token: string;
  rest: string;
}

/**
 * Date at the start of a line in any known format, with the remainder.
 */
export function leadingDate(line: string): LeadingDate | undefined {
  const words = line.split(' ');
  for (let count = Math.min(MAX_DATE_WORDS, words.length); count >= 1; count--) {
    const token = words.slice(0, count).join(' ');
    if (tryParseDate(token, ALL_DATE_FORMATS) !== undefined) {
      return { token, rest: words.slice(count).join(' ') };
    }
  }
  return undefined;
}

function hasSplitColumnHeader(page: RawPage): boolean {
  return page.lines.some(
    (line) =>
      UNIVERSAL_PATTERNS.dateHeader.test(line) &&
      UNIVERSAL_PATTERNS.debitHeader.test(line) &&
      UNIVERSAL_PATTERNS.creditHeader.test(line)
  );
}

interface Candidate {
  row: RawRow;
  text: string;
  continuation: string[];
}

export class UniversalExtractor implements Extractor {
  readonly id = 'universal';
  readonly strategy: ExtractionStrategy = 'heuristic';

  extract(doc: RawDocument): Iterable<RawRow> {
    logger.debug('Universal extraction started', { pages: doc.pages.length });
    return restartable(() => this.rows(doc));
  }

  detect(doc: RawDocument): boolean {
    return doc.pages.some((page) =>
      page.lines.some((line) => leadingDate(collapseWhitespace(line)) !== undefined)
    );
  }

  private *rows(doc: RawDocument): Generator<RawRow> {
    let previousBalance: number | undefined;

    for (const page of doc.pages) {
      const splitColumns = hasSplitColumnHeader(page);
      let pending: Candidate | null = null;

      for (const rawLine of page.lines) {
        const line = collapseWhitespace(rawLine);
        if (line === '') continue;

        const dated = leadingDate(line);
        if (dated === undefined) {
          if (pending === null) continue;
          if (findAmountTokens(line).length > 0 || UNIVERSAL_PATTERNS.noise.test(line)) continue;
          pending.continuation.push(line);
          continue;
        }

        if (pending !== null) yield finish(pending);
        pending = null;

        // Optional value date after the posting date
        const rest = leadingDate(dated.rest)?.rest ?? dated.rest;
        const tokens = findAmountTokens(rest);

        if (UNIVERSAL_PATTERNS.openingBalance.test(rest)) {
          const last = tokens[tokens.length - 1];
          if (last !== undefined) previousBalance = parseAmount(signedValue(last));
          continue;
        }

        const row: RawRow = { page: page.pageNumber, date: dated.token, source: line };
        const text = stripAmountTokens(rest, tokens);
        const balance = tokens.length >= 2 ? tokens[tokens.length - 1] : undefined;
        const balanceValue = balance === undefined ? undefined : parseAmount(signedValue(balance));

        if (splitColumns && tokens.length >= 3) {
          const [debit, credit] = tokens.slice(-3);
          row.withdrawal = debit?.magnitude;
          row.deposit = credit?.magnitude;
        } else {
          const amount = tokens.length >= 2 ? tokens[tokens.length - 2] : tokens[0];
          if (amount !== undefined) {
            assignAmount(row, amount, resolvePolarity(amount, previousBalance, balanceValue, text));
          }
        }

        if (balance !== undefined) row.balance = signedValue(balance);
        if (balanceValue !== undefined) previousBalance = balanceValue;
        pending = { row, text, continuation: [] };
      }

      if (pending !== null) yield finish(pending);
    }
  }
}

/**
 * Indicator, then printed sign, then the balance step, then keywords.
 */
function resolvePolarity(
  amount: AmountToken,
  previousBalance: number | undefined,
  balance: number | undefined,
  text: string
): Polarity | 'signed' | undefined {
  if (amount.indicator === 'CR') return 'deposit';
  if (amount.indicator === 'DR') return 'withdrawal';
  if (amount.sign !== 0) return 'signed';
  return (
    balanceTrendPolarity(previousBalance, balance, parseAmount(amount.magnitude)) ??
    keywordPolarity(text, GENERIC_KEYWORDS)
  );
}

function assignAmount(row: RawRow, amount: AmountToken, polarity: Polarity | 'signed' | undefined): void {
  switch (polarity) {
    case 'deposit':
      row.deposit = amount.magnitude;
      break;
    case 'withdrawal':
      row.withdrawal = amount.magnitude;
      break;
    case 'signed':
      row.amount = signedValue(amount);
      break;
    default:
      row.unsignedAmount = amount.magnitude;
  }
}

function finish({ row, text, continuation }: Candidate): RawRow {
  const full = [text, ...continuation].join(' ');
  return {
    ...row,
    description: collapseWhitespace(stripReferenceLabel(full)),
    reference: extractReference(full),
    source: [row.source, ...continuation].join('\n'),
  };
}
