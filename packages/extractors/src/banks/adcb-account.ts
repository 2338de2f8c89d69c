import type { RawDocument, RawRow } from '@statement-kit/types';
import { TextExtractor, type TextBlock } from '../text-extractor.js';
import { collapseWhitespace } from '../helpers/text.js';

const ADCB_ACCOUNT_PATTERNS = {
  // Serial, posting date, value date, reference
  rowStart: /^\d+\s+\d{2}-[A-Za-z]{3}-\d{4}\b/,
  // `amount -` (balance may follow) is a debit
  debit: /(\d+\.\d{2})\s*-\s*(\d+\.\d{2})?\s*$/,
  // `- amount` (balance may follow) is a credit
  credit: /^-\s*(\d+\.\d{2})(?:\s+(\d+\.\d{2}))?/,
};

/**
 * Account statements where the empty side of the debit/credit pair is
 * printed as a dash. The first line carries serial, dates and reference;
 * description lines follow, then the amount line.
 */
export class AdcbAccountExtractor extends TextExtractor<null> {
  readonly id = 'adcb-account';
  protected readonly signature = /\bADCB\b|abu dhabi commercial bank/i;
  protected readonly rowStart = ADCB_ACCOUNT_PATTERNS.rowStart;

  protected createState(_doc: RawDocument): null {
    return null;
  }

  protected parseBlock(block: TextBlock): RawRow {
    const [first = '', ...rest] = block.lines;
    const tokens = first.split(' ');
    const row: RawRow = {
      page: block.page,
      date: tokens[1] ?? '',
      reference: tokens[3],
      source: block.lines.join('\n'),
    };

    const description: string[] = [];
    // The header line may already end with the amounts
    for (const line of [tokens.slice(4).join(' '), ...rest]) {
      const plain = line.replace(/,/g, '');
      const debit = ADCB_ACCOUNT_PATTERNS.debit.exec(plain);
      const credit = debit === null ? ADCB_ACCOUNT_PATTERNS.credit.exec(plain) : null;

      if (debit?.[1] !== undefined) {
        row.withdrawal = debit[1];
        row.balance = debit[2];
        description.push(plain.slice(0, debit.index));
        break;
      }
      if (credit?.[1] !== undefined) {
        row.deposit = credit[1];
        row.balance = credit[2];
        break;
      }
      description.push(line);
    }

    row.description = collapseWhitespace(description.join(' '));
    return row;
  }
}
