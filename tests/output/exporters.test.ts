import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { normalize } from '@statement-kit/converter';
import { exportCsv, exportJson, exportWorkbook, toCanonicalRow, toExportDocument } from '@statement-kit/output';
import { validateExportDocument } from '@statement-kit/types';
import { rawRow } from '../helpers/documents.js';

const RESULT = normalize(
  [
    rawRow({ date: '01/02/2024', deposit: '12,000.00', description: 'Salary Credit', reference: '998877' }),
    rawRow({ date: '03/02/2024', withdrawal: '45.90', payee: 'Amazon, Inc.', description: 'Order "A1"' }),
    rawRow({ date: 'n/a', withdrawal: '1.00' }),
  ],
  { bankId: 'adcb-credit-card', extractor: 'adcb-credit-card', dateFormats: ['DD/MM/YYYY'], pages: 1 }
);

describe('toCanonicalRow', () => {
  it('uses null for the absent side', () => {
    const [first] = RESULT.transactions;
    if (first === undefined) throw new Error('expected a transaction');

    expect(toCanonicalRow(first, 'iso')).toEqual({
      date: '2024-02-01',
      withdrawal: null,
      deposit: 12000,
      payee: '',
      description: 'Salary Credit',
      referenceNumber: '998877',
    });
  });
});

describe('exportCsv', () => {
  it('writes the six columns with quoting', () => {
    expect(exportCsv(RESULT)).toBe(
      [
        'Date,Withdrawals,Deposits,Payee,Description,Reference Number',
        '01-02-2024,,12000.00,,Salary Credit,998877',
        '03-02-2024,45.90,,"Amazon, Inc.","Order ""A1""",',
      ].join('\n')
    );
  });

  it('supports ISO dates, another delimiter and no header', () => {
    const csv = exportCsv(RESULT, { includeHeader: false, delimiter: ';', dateFormat: 'iso' });

    expect(csv.split('\n')).toEqual([
      '2024-02-01;;12000.00;;Salary Credit;998877',
      '2024-02-03;45.90;;Amazon, Inc.;"Order ""A1""";',
    ]);
  });
});

describe('exportWorkbook', () => {
  it('writes numeric amount cells and leaves the absent side empty', () => {
    const workbook = XLSX.read(exportWorkbook(RESULT), { type: 'buffer' });
    const sheet = workbook.Sheets['Transactions'];
    if (sheet === undefined) throw new Error('expected a Transactions sheet');

    expect(workbook.SheetNames).toEqual(['Transactions']);
    expect(sheet['A1']?.v).toBe('Date');
    expect(sheet['F1']?.v).toBe('Reference Number');
    expect(sheet['A2']?.v).toBe('01-02-2024');
    expect(sheet['B2']).toBeUndefined();
    expect(sheet['C2']?.t).toBe('n');
    expect(sheet['C2']?.v).toBe(12000);
    expect(sheet['B3']?.v).toBe(45.9);
    expect(sheet['F2']?.v).toBe('998877');
  });

  it('names the sheet as asked', () => {
    const workbook = XLSX.read(exportWorkbook(RESULT, { sheetName: 'February' }), { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['February']);
  });
});

describe('JSON export', () => {
  const generatedAt = new Date('2024-03-01T00:00:00.000Z');

  it('keys transactions by the canonical column names', () => {
    const document = toExportDocument(RESULT, { fileName: 'statement.pdf', generatedAt });

    expect(document.transactions[0]).toEqual({
      'Date': '2024-02-01',
      'Withdrawals': null,
      'Deposits': 12000,
      'Payee': '',
      'Description': 'Salary Credit',
      'Reference Number': '998877',
    });
    expect(document.source).toEqual({ fileName: 'statement.pdf' });
    expect(document.generatedAt).toBe('2024-03-01T00:00:00.000Z');
  });

  it('summarises totals and dropped rows', () => {
    const document = toExportDocument(RESULT, { generatedAt });

    expect(document.summary).toEqual({
      transactionCount: 2,
      totalWithdrawals: 45.9,
      totalDeposits: 12000,
      droppedRows: 1,
      reconciled: null,
    });
    expect(document.diagnostics).toEqual([
      { row: 2, page: 1, action: 'dropped', reason: 'invalid-date', message: 'Unparseable date "n/a"' },
    ]);
  });

  it('produces a document the export schema accepts', () => {
    const parsed: unknown = JSON.parse(exportJson(RESULT, { generatedAt }));
    expect(validateExportDocument(parsed)).toEqual({ valid: true, errors: [] });
  });

  it('rejects a document with both amount columns set', () => {
    const document = toExportDocument(RESULT, { generatedAt });
    const broken = {
      ...document,
      transactions: [{ ...document.transactions[0], 'Withdrawals': 5 }],
    };

    expect(validateExportDocument(broken).valid).toBe(false);
  });
});
