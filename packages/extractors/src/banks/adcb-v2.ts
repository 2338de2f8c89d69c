import type { HeaderField } from '@statement-kit/types';
import { matchHeaderField } from '@statement-kit/types';
import { TableExtractor, cellAt, type AmountLayout, type TableAnchor } from '../table-extractor.js';

/**
 * Sr No | Date | Value Date | Bank Ref | Customer Ref | Description | Debit |
 * Credit | Balance. The bank reference is preferred; the customer reference
 * fills in when it is blank.
 */
export class AdcbV2Extractor extends TableExtractor {
  readonly id = 'adcb-v2';
  protected readonly signature = /\bADCB\b|abu dhabi commercial bank/i;
  protected readonly requiredFields: readonly HeaderField[] = ['serial', 'date', 'description'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['withdrawal', 'deposit']];

  protected override referenceFor(cells: readonly string[], anchor: TableAnchor): string | undefined {
    const header = anchor.grid[anchor.headerIndex] ?? [];
    for (const [index, label] of header.entries()) {
      if (matchHeaderField(label) !== 'reference') continue;
      const value = cellAt(cells, index);
      if (value !== '') return value;
    }
    return undefined;
  }
}
