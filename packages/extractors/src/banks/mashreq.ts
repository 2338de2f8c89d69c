import type { HeaderField } from '@statement-kit/types';
import { TableExtractor, type AmountLayout } from '../table-extractor.js';

/**
 * Date | Value Date | Reference | Description | Amount | Balance, with one
 * signed amount column.
 */
export class MashreqExtractor extends TableExtractor {
  readonly id = 'mashreq';
  protected readonly signature = /mashreq/i;
  protected readonly requiredFields: readonly HeaderField[] = ['date', 'description'];
  protected override readonly amountLayouts: readonly AmountLayout[] = [['amount']];
}
