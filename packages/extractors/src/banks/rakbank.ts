import type { HeaderField } from '@statement-kit/types';
import { TableExtractor, type AmountLayout } from '../table-extractor.js';

/**
 * Date | Description | Withdrawal | Deposit | Balance, dates as DD-MMM-YYYY.
 * Amount and balance cells carry `Cr.`/`Dr.` suffixes.
 */
export class RakbankExtractor extends TableExtractor {
  readonly id = 'rakbank';
  protected readonly signature = /\brak\s*bank\b|national bank of ras al khaimah/i;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['withdrawal', 'deposit']];
}
