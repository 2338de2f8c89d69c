import type { HeaderField } from '@statement-kit/types';
import { TableExtractor, type AmountLayout } from '../table-extractor.js';

// Date | Narration | Chq. No. | Withdrawal (Dr) | Deposit (Cr) | Balance
export class BankOfBarodaExtractor extends TableExtractor {
  readonly id = 'bank-of-baroda';
  protected readonly signature = /bank of baroda/i;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['withdrawal', 'deposit']];
}
