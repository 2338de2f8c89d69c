import type { HeaderField } from '@statement-kit/types';
import { TableExtractor, type AmountLayout } from '../table-extractor.js';

/**
 * Date | Value Date | Description | Reference | Debit | Credit | Balance.
 * The export repeats rows across page breaks, so duplicates are dropped.
 */
export class EmiratesIslamicExtractor extends TableExtractor {
  readonly id = 'emirates-islamic';
  protected readonly signature = /emirates\s+islamic/i;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description', 'reference'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['withdrawal', 'deposit']];
  protected override readonly dedupe = true;
}
