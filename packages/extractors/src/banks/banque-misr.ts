import type { HeaderField } from '@statement-kit/types';
import { TableExtractor, type AmountLayout } from '../table-extractor.js';

/**
 * Right-to-left grid: Balance | Credit | Debit | Value Date | TxnRefNo |
 * Description | Date. Columns are matched by label, so the order is irrelevant.
 */
export class BanqueMisrExtractor extends TableExtractor {
  readonly id = 'banque-misr';
  protected readonly signature = /banque\s+misr/i;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description', 'reference'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['withdrawal', 'deposit']];
}
