import type { RawDocument, RawRow } from '@statement-kit/types';
import { parseAmount } from '@statement-kit/types';
import { TextExtractor, DEFAULT_NOISE, type TextBlock } from '../text-extractor.js';
import { findAmountTokens } from '../helpers/amounts.js';
import { balanceTrendPolarity } from '../helpers/polarity.js';
import { collapseWhitespace } from '../helpers/text.js';

const ADCB_PATTERNS = {
  rowStart: /^\d{2}\/\d{2}\/\d{4}\b/,
  date: /\d{2}\/\d{2}\/\d{4}/,
  // Description runs from the posting date to the value date
  description: /^\d{2}\/\d{2}\/\d{4}\s*(.*?)\s*(?:\d{2}\/\d{2}\/\d{4}|$)/,
  reference: /(?<![\d.,])\d{6,}(?![\d.,])/,
  openingBalance: /opening\s+balance|balance\s+brought\s+forward|الرصيد الافتتاحي/i,
  header: /^date\b|\bbalance\b|الرصيد|\bpage\b/i,
};

interface AdcbState {
  previousBalance: number | undefined;
}

/**
 * `DD/MM/YYYY description DD/MM/YYYY … debit credit balance` with wrapped
 * descriptions. When the line only has an amount and a balance, the balance
 * movement decides the side.
 */
export class AdcbExtractor extends TextExtractor<AdcbState> {
  readonly id = 'adcb';
  protected readonly signature = /\bADCB\b|abu dhabi commercial bank/i;
  protected readonly rowStart = ADCB_PATTERNS.rowStart;
  protected override readonly ignoreLines = [...DEFAULT_NOISE, ADCB_PATTERNS.header, ADCB_PATTERNS.date];

  protected createState(_doc: RawDocument): AdcbState {
    return { previousBalance: undefined };
  }

  protected override onPreambleLine(line: string, state: AdcbState): void {
    if (!ADCB_PATTERNS.openingBalance.test(line)) return;
    const last = findAmountTokens(line).pop();
    if (last !== undefined) state.previousBalance = parseAmount(last.raw);
  }

  protected parseBlock(block: TextBlock, state: AdcbState): RawRow {
    const [first = '', ...continuation] = block.lines;
    const date = ADCB_PATTERNS.date.exec(first)?.[0] ?? '';
    const head = ADCB_PATTERNS.description.exec(first)?.[1] ?? '';
    const tokens = findAmountTokens(first.slice(date.length));

    const row: RawRow = {
      page: block.page,
      date,
      description: collapseWhitespace([head, ...continuation].join(' ')),
      reference: ADCB_PATTERNS.reference.exec(first)?.[0],
      source: block.lines.join('\n'),
    };

    if (tokens.length >= 3) {
      const [debit, credit, balance] = tokens.slice(-3);
      row.withdrawal = debit?.raw;
      row.deposit = credit?.raw;
      row.balance = balance?.raw;
    } else if (tokens.length === 2) {
      const [amount, balance] = tokens;
      row.balance = balance?.raw;
      const polarity = balanceTrendPolarity(
        state.previousBalance,
        balance === undefined ? undefined : parseAmount(balance.raw),
        amount === undefined ? undefined : parseAmount(amount.raw)
      );
      if (polarity === 'withdrawal') row.withdrawal = amount?.raw;
      else if (polarity === 'deposit') row.deposit = amount?.raw;
      else row.unsignedAmount = amount?.raw;
    } else if (tokens.length === 1) {
      row.unsignedAmount = tokens[0]?.raw;
    }

    if (row.balance !== undefined) state.previousBalance = parseAmount(row.balance);
    return row;
  }
}
