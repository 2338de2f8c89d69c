import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { load, loadCsv } from '@statement-kit/document-loader';
import { AuthenticationError, UnreadableDocumentError } from '@statement-kit/types';

function writeWorkbook(workbook: XLSX.WorkBook): Buffer {
  const written: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(written)) throw new Error('expected a buffer');
  return written;
}

function workbookBytes(sheets: Record<string, string[][]>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return writeWorkbook(workbook);
}

/** Date column holding serial numbers with a US display format. */
function datedWorkbookBytes(): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet([
    ['Date', 'Description', 'Debit', 'Credit'],
    ['', 'Card purchase', '20.00', ''],
    ['', 'Refund', '', '5.00'],
  ]);
  // 45335 is 13 Feb 2024, 45356 is 5 Mar 2024
  sheet['A2'] = { t: 'n', v: 45335, z: 'm/d/yy' };
  sheet['A3'] = { t: 'n', v: 45356, z: 'm/d/yy' };
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'Statement');
  return writeWorkbook(workbook);
}

describe('workbook loading', () => {
  it('turns every sheet into a page with the sheet matrix as its grid', async () => {
    const doc = await load(
      workbookBytes({
        Statement: [
          ['Account Statement'],
          ['Date', 'Description', 'Debit', 'Credit'],
          ['01/02/2024', 'Coffee', '12.50', ''],
        ],
        Notes: [['Generated for testing']],
      })
    );

    expect(doc.kind).toBe('spreadsheet');
    expect(doc.totalPages).toBe(2);
    expect(doc.metadata.sheetNames).toEqual(['Statement', 'Notes']);
    expect(doc.pages[0]?.tables[0]).toEqual([
      ['Account Statement', '', '', ''],
      ['Date', 'Description', 'Debit', 'Credit'],
      ['01/02/2024', 'Coffee', '12.50', ''],
    ]);
    expect(doc.pages[0]?.lines).toEqual(['Account Statement', 'Date\tDescription\tDebit\tCredit', '01/02/2024\tCoffee\t12.50']);
    expect(doc.pages[1]?.pageNumber).toBe(2);
  });

  it('reads date cells as ISO dates regardless of their display format', async () => {
    const doc = await load(datedWorkbookBytes());

    expect(doc.pages[0]?.tables[0]).toEqual([
      ['Date', 'Description', 'Debit', 'Credit'],
      ['2024-02-13', 'Card purchase', '20.00', ''],
      ['2024-03-05', 'Refund', '', '5.00'],
    ]);
  });

  it('ignores a password on a workbook that is not encrypted', async () => {
    const doc = await load(workbookBytes({ Statement: [['Date', 'Amount'], ['01/02/2024', '1.00']] }), 'test-secret');

    expect(doc.encrypted).toBe(false);
    expect(doc.pages[0]?.lines).toEqual(['Date\tAmount', '01/02/2024\t1.00']);
  });

  it('asks for the password of an encrypted workbook', async () => {
    const container = Buffer.concat([
      Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]),
      Buffer.alloc(64),
      Buffer.from('EncryptionInfo', 'utf16le'),
    ]);

    const error = await load(container).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error instanceof AuthenticationError && error.reason).toBe('missing');
  });

  it('refuses workbooks with more sheets than the page limit', async () => {
    const bytes = workbookBytes({ A: [['x']], B: [['y']] });
    await expect(load(bytes, undefined, { maxPages: 1 })).rejects.toBeInstanceOf(UnreadableDocumentError);
  });
});

describe('CSV loading', () => {
  it('reads a BOM-prefixed CSV with ragged rows into one sheet', () => {
    const csv = '\uFEFFDate,Description,Amount\n01/02/2024,"Salary, February",12000.00\nfooter\n';
    const doc = loadCsv(Buffer.from(csv, 'utf8'));

    expect(doc.metadata.sheetNames).toEqual(['Sheet1']);
    expect(doc.pages[0]?.tables[0]).toEqual([
      ['Date', 'Description', 'Amount'],
      ['01/02/2024', 'Salary, February', '12000.00'],
      ['footer'],
    ]);
  });

  it('rejects a file with no cells', () => {
    expect(() => loadCsv(Buffer.from(' , ,\n', 'utf8'))).toThrow('Spreadsheet contains no data');
  });
});

describe('load', () => {
  it('rejects an empty file', async () => {
    await expect(load(new Uint8Array())).rejects.toThrow('File is empty');
  });

  it('rejects unsupported binary content', async () => {
    await expect(load(Uint8Array.from([0x00, 0x13, 0x37]))).rejects.toThrow('Unsupported file format');
  });
});
