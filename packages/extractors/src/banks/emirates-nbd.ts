import type { HeaderField } from '@statement-kit/types';
import { TableExtractor, type AmountLayout, type TableAnchor } from '../table-extractor.js';

const TRANSFER_REFERENCE = /\b(AE\d+)\b/;

/**
 * Account statement grid: Transaction Date | Value Date | Narration | Debit |
 * Credit | Balance. Transfer references are embedded in the narration.
 */
export class EmiratesNbdExtractor extends TableExtractor {
  readonly id = 'emirates-nbd';
  protected readonly signature = /emirates\s*nbd/i;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['withdrawal', 'deposit']];

  protected override referenceFor(
    _cells: readonly string[],
    _anchor: TableAnchor,
    description: string
  ): string | undefined {
    return TRANSFER_REFERENCE.exec(description)?.[1];
  }
}
