import type { HeaderField } from '@statement-kit/types';
import { TableExtractor, type AmountLayout } from '../table-extractor.js';

// Date | Chq/Ref | Description | Debit | Credit | Balance
export class DibExtractor extends TableExtractor {
  readonly id = 'dib';
  protected readonly signature = /dubai islamic bank|\bDIB\b/;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['withdrawal', 'deposit']];
}
