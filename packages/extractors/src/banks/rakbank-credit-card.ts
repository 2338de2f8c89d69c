import type { RawDocument, RawRow } from '@statement-kit/types';
import { TextExtractor, type TextBlock } from '../text-extractor.js';
import { collapseWhitespace } from '../helpers/text.js';

const AMOUNT = String.raw`(?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2}`;
const CURRENCIES = 'AED|QAR|USD|EUR|GBP|SAR|INR|OMR|KWD|BHD';

const RAKBANK_CARD_PATTERNS = {
  rowStart: /^\d{2}\/\d{2}\/\d{4}\b/,
  headerWords: [/\bTRANSACTION\b/i, /\bDESCRIPTION\b/i, /\bCURRENCY\b/i, /\bAMOUNT\b/i, /\bCARD NO\b/i],
  // CUR original [Cr] [rate] billed [Cr]
  foreign: new RegExp(String.raw`\s(${CURRENCIES})\s+(${AMOUNT})\s*(Cr)?\s*(?:(\d+\.\d+)\s+)?(${AMOUNT})\s*(Cr)?$`, 'i'),
  local: new RegExp(String.raw`\sAED\s+(${AMOUNT})\s*(Cr)?$`, 'i'),
};

/**
 * Card statements list the original currency amount followed by the AED
 * amount billed; `Cr` marks a credit to the card.
 */
export class RakbankCreditCardExtractor extends TextExtractor<null> {
  readonly id = 'rakbank-credit-card';
  protected readonly signature = /\brak\s*bank\b|national bank of ras al khaimah/i;
  protected readonly rowStart = RAKBANK_CARD_PATTERNS.rowStart;

  protected createState(_doc: RawDocument): null {
    return null;
  }

  protected parseBlock(block: TextBlock): RawRow | null {
    const [first = '', ...continuation] = block.lines;
    // A column header that starts with the statement date
    const headerHits = RAKBANK_CARD_PATTERNS.headerWords.filter((word) => word.test(first)).length;
    if (headerHits >= 2) return null;

    const date = first.split(' ')[0] ?? '';
    const row: RawRow = { page: block.page, date, source: block.lines.join('\n') };

    let amount: string | undefined;
    let credit = false;
    let descriptionEnd = first.length;

    const foreign = RAKBANK_CARD_PATTERNS.foreign.exec(first);
    if (foreign !== null) {
      amount = foreign[5];
      credit = foreign[6] !== undefined;
      descriptionEnd = foreign.index;
    } else {
      const local = RAKBANK_CARD_PATTERNS.local.exec(first);
      if (local !== null) {
        amount = local[1];
        credit = local[2] !== undefined;
        descriptionEnd = local.index;
      }
    }

    if (amount !== undefined) {
      if (credit) row.deposit = amount;
      else row.withdrawal = amount;
    }

    row.description = collapseWhitespace(`${first.slice(date.length, descriptionEnd)} ${continuation.join(' ')}`);
    return row;
  }
}
