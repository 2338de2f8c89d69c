import type { RawDocument, RawRow } from '@statement-kit/types';
import { TextExtractor, type TextBlock } from '../text-extractor.js';
import { findAmountTokens, stripAmountTokens } from '../helpers/amounts.js';
import { collapseWhitespace } from '../helpers/text.js';

const PLUTO_PATTERNS = {
  rowStart: /^\d{2}\/\d{2}\/\d{4}\s+\S/,
  header: /POSTING|TRANSACTION DATE/i,
  transactionId: /\bT-\d+\b/,
  continuation: /^T-\d+/,
  // Original-currency amounts (`USD 12.00`) are informational
  currencyPrefix: /[A-Z]{3}\s?$/,
  dates: /\d{2}\/\d{2}\/\d{4}/g,
  noise: /\bT-\d+\b|\b\d{7,}\b/g,
  kind: /^(?:Card Transaction|Deposit)\b\s*/i,
};

/**
 * Corporate card statements. A transaction is one line, sometimes followed
 * by its `T-…` transaction id; amounts are signed and the last one is the
 * running balance.
 */
export class PlutoExtractor extends TextExtractor<null> {
  readonly id = 'pluto';
  protected readonly signature = /\bpluto\b/i;
  protected readonly rowStart = PLUTO_PATTERNS.rowStart;

  protected createState(_doc: RawDocument): null {
    return null;
  }

  protected parseBlock(block: TextBlock): RawRow | null {
    const [first = '', next] = block.lines;
    if (PLUTO_PATTERNS.header.test(first)) return null;

    const lines = next !== undefined && PLUTO_PATTERNS.continuation.test(next) ? [first, next] : [first];
    const text = lines.join(' ');
    const date = first.split(' ')[0] ?? '';

    const tokens = findAmountTokens(text).filter(
      (token) => !PLUTO_PATTERNS.currencyPrefix.test(text.slice(0, token.index))
    );

    const row: RawRow = {
      page: block.page,
      date,
      reference: referenceFor(text),
      source: lines.join('\n'),
    };

    if (tokens.length >= 2) {
      row.amount = tokens[tokens.length - 2]?.raw;
      row.balance = tokens[tokens.length - 1]?.raw;
    } else if (tokens.length === 1) {
      row.amount = tokens[0]?.raw;
    }

    const description = collapseWhitespace(
      stripAmountTokens(text, findAmountTokens(text))
        .replace(PLUTO_PATTERNS.dates, ' ')
        .replace(PLUTO_PATTERNS.noise, ' ')
    ).replace(PLUTO_PATTERNS.kind, '');
    row.description = description;
    return row;
  }
}

function referenceFor(text: string): string | undefined {
  if (/Card Transaction/i.test(text)) {
    const id = PLUTO_PATTERNS.transactionId.exec(text)?.[0];
    return id === undefined ? 'Card Transaction' : `Card Transaction ${id}`;
  }
  if (/\bDeposit\b/i.test(text)) return 'Deposit';
  return undefined;
}
