import type { RawDocument, RawRow } from '@statement-kit/types';
import { TextExtractor, DEFAULT_NOISE, type TextBlock } from '../text-extractor.js';
import { collapseWhitespace, extractReference, stripReferenceLabel } from '../helpers/text.js';

const ADCB_CARD_PATTERNS = {
  rowStart: /^\d{2}\/\d{2}\/\d{4}\b/,
  // posting date, optional transaction date, description, amount, CR/DR, Ref#
  transactionLine:
    /^(\d{2}\/\d{2}\/\d{4})\s+(?:(\d{2}\/\d{2}\/\d{4})\s+)?(.*?)\s*((?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2})(?:\s*(CR|DR)\b\.?)?(?:\s+Ref\s*#?\s*:?\s*(\S+))?\s*$/i,
  footer: /balance|outstanding|^page\b|\[1 /i,
};

/**
 * Card statement lines: `DD/MM/YYYY [DD/MM/YYYY] description amount [CR|DR] [Ref#…]`.
 * A `CR` marks a payment or refund; anything else is a card purchase.
 */
export class AdcbCreditCardExtractor extends TextExtractor<null> {
  readonly id = 'adcb-credit-card';
  protected readonly signature = /\bADCB\b|abu dhabi commercial bank/i;
  protected readonly rowStart = ADCB_CARD_PATTERNS.rowStart;
  protected override readonly ignoreLines = [...DEFAULT_NOISE, ADCB_CARD_PATTERNS.footer];

  protected createState(_doc: RawDocument): null {
    return null;
  }

  protected parseBlock(block: TextBlock): RawRow {
    const [first = '', ...continuation] = block.lines;
    const match = ADCB_CARD_PATTERNS.transactionLine.exec(first);

    if (match === null) {
      // Dated line without an amount; the normalizer reports it
      const date = first.split(' ')[0] ?? '';
      return {
        page: block.page,
        date,
        description: collapseWhitespace([first.slice(date.length), ...continuation].join(' ')),
        source: block.lines.join('\n'),
      };
    }

    const [, date = '', , text = '', amount, indicator, reference] = match;
    const description = collapseWhitespace(stripReferenceLabel([text, ...continuation].join(' ')));
    const isCredit = indicator?.toUpperCase() === 'CR';

    return {
      page: block.page,
      date,
      deposit: isCredit ? amount : undefined,
      withdrawal: isCredit ? undefined : amount,
      description,
      reference: reference ?? extractReference(continuation.join(' ')),
      source: block.lines.join('\n'),
    };
  }
}
