import type { HeaderField } from '@statement-kit/types';
import { TableExtractor, type AmountLayout } from '../table-extractor.js';

// Date (YYYY-MM-DD) | Transaction | Reference Number | Debit | Credit | Balance
export class MashreqV2Extractor extends TableExtractor {
  readonly id = 'mashreq-v2';
  protected readonly signature = /mashreq/i;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description', 'reference'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['withdrawal', 'deposit']];
}
