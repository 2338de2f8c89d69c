import { describe, it, expect } from 'vitest';
import { UniversalExtractor, leadingDate } from '@statement-kit/extractors';
import { textDocument } from '../helpers/documents.js';

describe('leadingDate', () => {
  it('accepts multi-word dates', () => {
    expect(leadingDate('Feb 01, 2024 Coffee 12.00')).toEqual({ token: 'Feb 01, 2024', rest: 'Coffee 12.00' });
  });

  it('requires the date at the start of the line', () => {
    expect(leadingDate('Coffee 01/02/2024')).toBeUndefined();
  });
});

describe('UniversalExtractor', () => {
  const extractor = new UniversalExtractor();

  it('reads a CR line as a deposit and lifts the reference out of the description', () => {
    const rows = Array.from(extractor.extract(textDocument(['01/02/2024  Salary Credit  12,000.00  CR  Ref#998877'])));

    expect(rows).toEqual([
      {
        page: 1,
        date: '01/02/2024',
        deposit: '12,000.00',
        description: 'Salary Credit',
        reference: '998877',
        source: '01/02/2024 Salary Credit 12,000.00 CR Ref#998877',
      },
    ]);
  });

  it('falls back from the balance step to keywords to the printed sign', () => {
    const doc = textDocument([
      'Account statement',
      '01/02/2024 Opening Balance 1,000.00',
      '02/02/2024 03/02/2024 POS PURCHASE 45.00 955.00',
      'CARD ENDING 4111',
      'Page 1 of 2',
      '05/02/2024 ATM WITHDRAWAL 200.00',
      '06/02/2024 Refund adjustment -15.00',
      '07/02/2024 Miscellaneous 30.00',
      'Closing balance 740.00',
    ]);

    const rows = Array.from(extractor.extract(doc));

    expect(rows).toMatchObject([
      { date: '02/02/2024', withdrawal: '45.00', balance: '955.00', description: 'POS PURCHASE CARD ENDING 4111' },
      { date: '05/02/2024', withdrawal: '200.00', description: 'ATM WITHDRAWAL' },
      { date: '06/02/2024', amount: '-15.00', description: 'Refund adjustment' },
      { date: '07/02/2024', unsignedAmount: '30.00', description: 'Miscellaneous' },
    ]);
  });

  it('reads debit and credit columns under a split header', () => {
    const doc = textDocument([
      'Date Description Debit Credit Balance',
      '01/03/2024 Rent 2,000.00 0.00 8,000.00',
      '02/03/2024 Salary 0.00 9,000.00 17,000.00',
    ]);

    const rows = Array.from(extractor.extract(doc));

    expect(rows).toMatchObject([
      { withdrawal: '2,000.00', deposit: '0.00', balance: '8,000.00', description: 'Rent' },
      { withdrawal: '0.00', deposit: '9,000.00', balance: '17,000.00', description: 'Salary' },
    ]);
  });

  it('yields nothing for a document without dated lines', () => {
    const doc = textDocument(['Scanned statement'], []);

    expect(extractor.detect(doc)).toBe(false);
    expect(Array.from(extractor.extract(doc))).toEqual([]);
  });

  it('can be iterated more than once', () => {
    const rows = extractor.extract(textDocument(['01/02/2024 Coffee 12.00 DR']));

    expect(Array.from(rows)).toHaveLength(1);
    expect(Array.from(rows)).toHaveLength(1);
  });
});
