import { describe, it, expect } from 'vitest';
import { convert, convertDocument, getBankProfile, listBanks } from '@statement-kit/converter';
import {
  BANK_IDS,
  FormatMismatchError,
  UnknownBankError,
  UnreadableDocumentError,
} from '@statement-kit/types';
import { tableDocument, textDocument } from '../helpers/documents.js';

const WORKED_EXAMPLE = textDocument(['01/02/2024  Salary Credit  12,000.00  CR  Ref#998877']);

const ENBD_STATEMENT = tableDocument('Emirates NBD Account Statement', [
  ['Transaction Date', 'Value Date', 'Narration', 'Debit', 'Credit', 'Balance'],
  ['02-02-2024', '02-02-2024', 'TRANSFER AE070330000012345 RENT', '3,000.00', '', '7,000.00'],
  ['05-02-2024', '05-02-2024', 'SALARY', '', '12,000.00', '19,000.00'],
]);

describe('registry', () => {
  it('has one profile per bank id, in catalog order', () => {
    expect(listBanks().map((profile) => profile.id)).toEqual([...BANK_IDS]);
  });

  it('rejects ids outside the catalog', () => {
    expect(() => getBankProfile('BANK_X')).toThrow(UnknownBankError);
  });

  it('freezes profiles', () => {
    expect(Object.isFrozen(getBankProfile('emirates-nbd'))).toBe(true);
  });
});

describe('convertDocument', () => {
  it('converts a card statement line into a deposit', () => {
    const result = convertDocument('adcb-credit-card', textDocument(['ADCB', ...(WORKED_EXAMPLE.pages[0]?.lines ?? [])]));

    expect(result.bankId).toBe('adcb-credit-card');
    expect(result.extractor).toBe('adcb-credit-card');
    expect(result.fallback).toBe(false);
    expect(result.transactions).toEqual([
      { date: '2024-02-01', deposit: 12000, payee: '', description: 'Salary Credit', referenceNumber: '998877' },
    ]);
    expect(result.reconciliation?.applicable).toBe(false);
    expect(result.warnings).toEqual([]);
  });

  it('surfaces a layout mismatch for an explicit bank', () => {
    expect(() => convertDocument('emirates-nbd', textDocument(['Unrelated letter']))).toThrow(FormatMismatchError);
  });

  it('refuses a document kind the bank does not publish', () => {
    expect(() => convertDocument('excel', WORKED_EXAMPLE)).toThrow(UnreadableDocumentError);
  });

  it('gives the same result on every run', () => {
    const first = convertDocument('emirates-nbd', ENBD_STATEMENT, { minReconciledRows: 1 });
    const second = convertDocument('emirates-nbd', ENBD_STATEMENT, { minReconciledRows: 1 });

    expect(second).toEqual(first);
  });

  it('warns when the running balance does not reconcile', () => {
    const result = convertDocument('emirates-nbd', ENBD_STATEMENT, { minReconciledRows: 3 });

    expect(result.reconciliation?.passed).toBe(false);
    expect(result.warnings).toEqual(['Running balance reconciled for 1 consecutive row pairs; 3 required']);
  });
});

describe('convertDocument with "other"', () => {
  it('uses a catalogued layout it recognises', () => {
    const result = convertDocument('other', ENBD_STATEMENT, { autoDetect: true, minReconciledRows: 1 });

    expect(result.bankId).toBe('other');
    expect(result.extractor).toBe('emirates-nbd');
    expect(result.fallback).toBe(false);
    expect(result.transactions.map((tx) => tx.referenceNumber)).toEqual(['AE070330000012345', '']);
    expect(result.warnings).toEqual([]);
  });

  it('falls back to the universal extractor', () => {
    const result = convertDocument('other', WORKED_EXAMPLE, { autoDetect: true });

    expect(result.extractor).toBe('universal');
    expect(result.fallback).toBe(true);
    expect(result.transactions).toEqual([
      { date: '2024-02-01', deposit: 12000, payee: '', description: 'Salary Credit', referenceNumber: '998877' },
    ]);
  });

  it.each([
    ['15.03.2024', '2024-03-15'],
    ['15/03/24', '2024-03-15'],
    ['05-Feb-24', '2024-02-05'],
    ['05FEB24', '2024-02-05'],
    ['Feb 01, 2024', '2024-02-01'],
    ['7 Mar 2024', '2024-03-07'],
  ])('keeps universal rows dated %s', (printed, iso) => {
    const result = convertDocument('other', textDocument(['Statement', `${printed} Coffee 12.00 DR`]), {
      autoDetect: false,
    });

    expect(result.transactions.map((tx) => [tx.date, tx.withdrawal])).toEqual([[iso, 12]]);
    expect(result.diagnostics).toEqual([]);
  });

  it('skips detection when it is turned off', () => {
    const result = convertDocument('other', ENBD_STATEMENT, { autoDetect: false });
    expect(result.extractor).toBe('universal');
  });

  it('returns an empty result with a warning when nothing is dated', () => {
    const result = convertDocument('other', textDocument(['Scanned statement']), { autoDetect: true });

    expect(result.transactions).toEqual([]);
    expect(result.stats.rowsSeen).toBe(0);
    expect(result.warnings).toEqual([
      'No dated transaction lines were found; the document may be scanned or use an unsupported layout',
    ]);
  });
});

describe('convert', () => {
  const csv = [
    'Statement of account',
    'Date,Description,Amount,Balance',
    '01/02/2024,Salary Credit,12000.00,12000.00',
    '02/02/2024,Groceries,-150.50,11849.50',
  ].join('\n');

  it('loads and converts a spreadsheet export', async () => {
    const result = await convert('excel', Buffer.from(csv, 'utf8'), undefined, { minReconciledRows: 1 });

    expect(result.extractor).toBe('excel');
    expect(result.transactions).toEqual([
      { date: '2024-02-01', deposit: 12000, payee: '', description: 'Salary Credit', referenceNumber: '' },
      { date: '2024-02-02', withdrawal: 150.5, payee: '', description: 'Groceries', referenceNumber: '' },
    ]);
    expect(result.reconciliation?.passed).toBe(true);
  });

  it('rejects an unknown bank before reading the file', async () => {
    await expect(convert('BANK_X', Buffer.from(csv, 'utf8'))).rejects.toBeInstanceOf(UnknownBankError);
  });

  it('rejects a spreadsheet for a PDF-only bank', async () => {
    await expect(convert('emirates-nbd', Buffer.from(csv, 'utf8'))).rejects.toThrow(
      'Emirates NBD does not accept spreadsheet documents'
    );
  });

  it('rejects an empty file', async () => {
    await expect(convert('other', new Uint8Array(0))).rejects.toBeInstanceOf(UnreadableDocumentError);
  });
});
