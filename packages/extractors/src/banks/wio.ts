import type { RawDocument, RawRow } from '@statement-kit/types';
import { TextExtractor, type TextBlock } from '../text-extractor.js';
import { collapseWhitespace, documentText } from '../helpers/text.js';

const SIGNED = String.raw`[+-]?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?`;

const WIO_PATTERNS = {
  rowStart: /^\d{2}\/\d{2}\/\d{4}\s+\S/,
  creditStatement: /CREDIT STATEMENT|CREDIT LIMIT/i,
  // DD/MM/YYYY [P-ref] description signed-amount [balance]
  accountLine: new RegExp(String.raw`^(\d{2}\/\d{2}\/\d{4})\s+(?:(P\d+)\s+)?(.*?)\s+(${SIGNED})(?:\s+(${SIGNED}))?$`),
  // DD/MM/YYYY ref description [****1234] signed-amount
  cardLine: new RegExp(String.raw`^(\d{2}\/\d{2}\/\d{4})\s+([A-Z0-9]+)\s+(.+?)\s+(?:(\*{4}\$?\d+)\s+)?(${SIGNED})$`),
};

interface WioMode {
  creditCard: boolean;
}

/**
 * Account and credit card statements share the bank's name; the card
 * statement is recognised by its credit limit section. Amounts are signed.
 */
export class WioExtractor extends TextExtractor<WioMode> {
  readonly id = 'wio';
  protected readonly signature = /\bwio\b/i;
  protected readonly rowStart = WIO_PATTERNS.rowStart;

  protected createState(doc: RawDocument): WioMode {
    return { creditCard: WIO_PATTERNS.creditStatement.test(documentText(doc)) };
  }

  protected parseBlock(block: TextBlock, mode: WioMode): RawRow {
    const [first = '', ...continuation] = block.lines;
    const source = block.lines.join('\n');
    const extra = continuation.join(' ');

    if (mode.creditCard) {
      const match = WIO_PATTERNS.cardLine.exec(first);
      if (match !== null) {
        const [, date = '', reference, description = '', , amount] = match;
        return {
          page: block.page,
          date,
          amount,
          description: collapseWhitespace(`${description} ${extra}`),
          reference,
          source,
        };
      }
    } else {
      const match = WIO_PATTERNS.accountLine.exec(first);
      if (match !== null) {
        const [, date = '', reference, description = '', amount, balance] = match;
        return {
          page: block.page,
          date,
          amount,
          balance,
          description: collapseWhitespace(`${description} ${extra}`),
          reference,
          source,
        };
      }
    }

    const date = first.split(' ')[0] ?? '';
    return {
      page: block.page,
      date,
      description: collapseWhitespace(`${first.slice(date.length)} ${extra}`),
      source,
    };
  }
}
