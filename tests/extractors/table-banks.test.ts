import { describe, it, expect } from 'vitest';
import {
  AdcbV2Extractor,
  BanqueMisrExtractor,
  DibExtractor,
  EmiratesIslamicExtractor,
  EmiratesNbdExtractor,
  MashreqExtractor,
  RakbankExtractor,
  SpreadsheetExtractor,
} from '@statement-kit/extractors';
import { FormatMismatchError } from '@statement-kit/types';
import { tableDocument, textDocument } from '../helpers/documents.js';

describe('EmiratesNbdExtractor', () => {
  const doc = tableDocument('Emirates NBD Account Statement', [
    ['Transaction Date', 'Value Date', 'Narration', 'Debit', 'Credit', 'Balance'],
    ['01-02-2024', '01-02-2024', 'Opening Balance', '', '', '10,000.00'],
    ['02-02-2024', '02-02-2024', 'TRANSFER AE070330000012345 RENT', '3,000.00', '', '7,000.00'],
    ['', '', 'Card ending 1234', '', '', ''],
    ['05-02-2024', '05-02-2024', 'SALARY', '', '12,000.00', '19,000.00'],
  ]);

  it('reads one row per dated grid row and skips the opening balance', () => {
    const rows = Array.from(new EmiratesNbdExtractor().extract(doc));

    expect(rows).toMatchObject([
      {
        page: 1,
        date: '02-02-2024',
        withdrawal: '3,000.00',
        deposit: undefined,
        balance: '7,000.00',
        description: 'TRANSFER AE070330000012345 RENT Card ending 1234',
        reference: 'AE070330000012345',
      },
      {
        date: '05-02-2024',
        withdrawal: undefined,
        deposit: '12,000.00',
        balance: '19,000.00',
        description: 'SALARY',
        reference: undefined,
      },
    ]);
  });

  it('keeps the source text of merged rows', () => {
    const [first] = Array.from(new EmiratesNbdExtractor().extract(doc));
    expect(first?.source).toBe(
      '02-02-2024 | 02-02-2024 | TRANSFER AE070330000012345 RENT | 3,000.00 | | 7,000.00\n| | Card ending 1234 | | |'
    );
  });

  it('can be iterated more than once', () => {
    const rows = new EmiratesNbdExtractor().extract(doc);
    expect(Array.from(rows)).toHaveLength(2);
    expect(Array.from(rows)).toHaveLength(2);
  });

  it('detects its own statements only', () => {
    const extractor = new EmiratesNbdExtractor();
    expect(extractor.detect(doc)).toBe(true);
    expect(extractor.detect(textDocument(['Emirates NBD', 'no table here']))).toBe(false);
  });

  it('throws a format mismatch when no table header is found', () => {
    const extractor = new EmiratesNbdExtractor();
    expect(() => extractor.extract(textDocument(['Some other bank']))).toThrow(FormatMismatchError);
  });
});

describe('EmiratesIslamicExtractor', () => {
  it('drops rows repeated across a page break', () => {
    const row = ['03/02/2024', '03/02/2024', 'ATM WITHDRAWAL', 'REF100200', '500.00', '', '4,500.00'];
    const doc = tableDocument('Emirates Islamic', [
      ['Date', 'Value Date', 'Description', 'Reference', 'Debit', 'Credit', 'Balance'],
      row,
      row,
      ['04/02/2024', '04/02/2024', 'PROFIT', 'REF100201', '', '10.00', '4,510.00'],
    ]);

    const rows = Array.from(new EmiratesIslamicExtractor().extract(doc));

    expect(rows.map((r) => r.reference)).toEqual(['REF100200', 'REF100201']);
  });

  it('requires a reference column', () => {
    const doc = tableDocument('Emirates Islamic', [
      ['Date', 'Description', 'Debit', 'Credit', 'Balance'],
      ['03/02/2024', 'ATM WITHDRAWAL', '500.00', '', '4,500.00'],
    ]);
    expect(() => new EmiratesIslamicExtractor().extract(doc)).toThrow(FormatMismatchError);
  });
});

describe('RakbankExtractor', () => {
  it('strips Cr./Dr. suffixes and signs an overdrawn balance', () => {
    const doc = tableDocument('RAKBANK', [
      ['Date', 'Description', 'Withdrawal', 'Deposit', 'Balance'],
      ['10-Feb-2024', 'SALARY FEB', '', '5,000.00 Cr.', '4,800.00 Cr.'],
      ['11-Feb-2024', 'RENT', '6,000.00 Dr.', '', '1,200.00 Dr.'],
    ]);

    const rows = Array.from(new RakbankExtractor().extract(doc));

    expect(rows).toMatchObject([
      { date: '10-Feb-2024', deposit: '5,000.00', withdrawal: undefined, balance: '4,800.00' },
      { date: '11-Feb-2024', withdrawal: '6,000.00', deposit: undefined, balance: '-1,200.00' },
    ]);
  });
});

describe('DibExtractor', () => {
  it('takes amounts printed on the line below the date', () => {
    const doc = tableDocument('Dubai Islamic Bank', [
      ['Date', 'Chq/Ref', 'Description', 'Debit', 'Credit', 'Balance'],
      ['03/02/2024', 'CHQ 100200', 'Cheque deposit', '', '', ''],
      ['', '', 'clearing', '', '500.00', '1,500.00'],
      ['Date', 'Chq/Ref', 'Description', 'Debit', 'Credit', 'Balance'],
      ['04/02/2024', '', 'Closing Balance', '', '', '1,500.00'],
    ]);

    const rows = Array.from(new DibExtractor().extract(doc));

    expect(rows).toMatchObject([
      {
        date: '03/02/2024',
        description: 'Cheque deposit clearing',
        reference: 'CHQ 100200',
        deposit: '500.00',
        withdrawal: undefined,
        balance: '1,500.00',
      },
    ]);
  });
});

describe('MashreqExtractor', () => {
  it('keeps the sign of a single amount column', () => {
    const doc = tableDocument('Mashreq', [
      ['Date', 'Value Date', 'Reference', 'Description', 'Amount', 'Balance'],
      ['01/03/2024', '01/03/2024', 'FT1001', 'GROCERY', '-250.00', '750.00'],
      ['02/03/2024', '02/03/2024', 'FT1002', 'REFUND', '1,000.00', '1,750.00'],
      ['03/03/2024', '03/03/2024', 'FT1003', 'CARD FEE', '75.00 Dr', '1,675.00'],
    ]);

    const rows = Array.from(new MashreqExtractor().extract(doc));

    expect(rows.map((r) => r.amount)).toEqual(['-250.00', '1,000.00', '-75.00']);
    expect(rows.every((r) => r.withdrawal === undefined && r.deposit === undefined)).toBe(true);
  });
});

describe('BanqueMisrExtractor', () => {
  it('maps right-to-left columns by label', () => {
    const doc = tableDocument('Banque Misr', [
      ['Balance', 'Credit', 'Debit', 'Value Date', 'TxnRefNo', 'Description', 'Date'],
      ['2,000.00', '', '150.00', '05/03/2024', 'TX778899', 'UTILITY BILL', '05/03/2024'],
    ]);

    const rows = Array.from(new BanqueMisrExtractor().extract(doc));

    expect(rows).toMatchObject([
      {
        date: '05/03/2024',
        description: 'UTILITY BILL',
        reference: 'TX778899',
        withdrawal: '150.00',
        deposit: undefined,
        balance: '2,000.00',
      },
    ]);
  });
});

describe('AdcbV2Extractor', () => {
  it('falls back to the customer reference when the bank reference is blank', () => {
    const doc = tableDocument('ADCB', [
      ['Sr No', 'Date', 'Value Date', 'Bank Ref', 'Customer Ref', 'Description', 'Debit', 'Credit', 'Balance'],
      ['1', '06/03/2024', '06/03/2024', 'BR5501', 'CUST01', 'POS PURCHASE', '40.00', '', '960.00'],
      ['2', '07/03/2024', '07/03/2024', '', 'CUST02', 'TRANSFER IN', '', '100.00', '1,060.00'],
    ]);

    const rows = Array.from(new AdcbV2Extractor().extract(doc));

    expect(rows.map((r) => r.reference)).toEqual(['BR5501', 'CUST02']);
  });
});

describe('SpreadsheetExtractor', () => {
  it('finds a header below a title block', () => {
    const doc = tableDocument(
      'Statement of account',
      [
        ['Statement of account', '', '', ''],
        ['Account 0011', '', '', ''],
        ['', '', '', ''],
        ['Date', 'Description', 'Amount', 'Balance'],
        ['01/02/2024', 'Salary Credit', '12000', '12000'],
        ['02/02/2024', 'Groceries', '-150.5', '11849.5'],
      ],
      'spreadsheet'
    );

    const extractor = new SpreadsheetExtractor();
    const rows = Array.from(extractor.extract(doc));

    expect(extractor.strategy).toBe('spreadsheet');
    expect(rows).toMatchObject([
      { date: '01/02/2024', amount: '12000', balance: '12000', description: 'Salary Credit' },
      { date: '02/02/2024', amount: '-150.5', balance: '11849.5', description: 'Groceries' },
    ]);
  });
});
