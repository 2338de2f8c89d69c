import type { HeaderField } from '@statement-kit/types';
import { TableExtractor, type AmountLayout } from '../table-extractor.js';

/**
 * Date (DD.MM.YYYY) | Description | Debit | Credit | Balance. Headers may be
 * printed in Arabic only; the synonym table covers both.
 */
export class UabExtractor extends TableExtractor {
  readonly id = 'uab';
  protected readonly signature = /united arab bank|\bUAB\b/;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['withdrawal', 'deposit']];
}
