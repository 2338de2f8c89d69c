/**
 * Tests for row clustering utilities.
 */
import { describe, it, expect } from 'vitest';
import { buildRowText, groupByRows, rowsToLines } from '@statement-kit/document-loader';
import type { TextItem } from '@statement-kit/types';

describe('groupByRows', () => {
  it('should group items with similar Y coordinates into rows', () => {
    const items: TextItem[] = [
      { str: 'Date', x: 50, y: 700, width: 30, height: 12, page: 1 },
      { str: 'Description', x: 150, y: 700, width: 80, height: 12, page: 1 },
      { str: 'Amount', x: 400, y: 701.5, width: 50, height: 12, page: 1 },
      { str: '01/02/2024', x: 50, y: 680, width: 50, height: 12, page: 1 },
      { str: 'GROCERY', x: 150, y: 680, width: 70, height: 12, page: 1 },
      { str: '-5.50', x: 400, y: 680, width: 40, height: 12, page: 1 },
    ];

    const rows = groupByRows(items, 3.0);

    expect(rows).toHaveLength(2);
    expect(rows[0]?.items).toHaveLength(3);
    expect(rows[1]?.items.map((item) => item.str)).toEqual(['01/02/2024', 'GROCERY', '-5.50']);
  });

  it('should keep pages apart and in page order', () => {
    const items: TextItem[] = [
      { str: 'Page2Item', x: 50, y: 700, width: 60, height: 12, page: 2 },
      { str: 'Page1Item', x: 50, y: 700, width: 60, height: 12, page: 1 },
    ];

    const rows = groupByRows(items, 3.0);

    expect(rows.map((row) => row.page)).toEqual([1, 2]);
  });

  it('should order rows top to bottom', () => {
    const items: TextItem[] = [
      { str: 'lower', x: 50, y: 100, width: 30, height: 12, page: 1 },
      { str: 'upper', x: 50, y: 500, width: 30, height: 12, page: 1 },
    ];

    expect(rowsToLines(groupByRows(items))).toEqual(['upper', 'lower']);
  });

  it('should return empty array for empty input', () => {
    expect(groupByRows([], 3.0)).toHaveLength(0);
  });
});

describe('buildRowText', () => {
  it('uses a space for word gaps and a tab for column gaps', () => {
    const items: TextItem[] = [
      { str: 'Salary', x: 50, y: 700, width: 40, height: 12, page: 1 },
      { str: 'Credit', x: 100, y: 700, width: 40, height: 12, page: 1 },
      { str: '12,000.00', x: 300, y: 700, width: 50, height: 12, page: 1 },
    ];

    expect(buildRowText(items)).toBe('Salary Credit\t12,000.00');
  });

  it('joins touching items without a separator', () => {
    const items: TextItem[] = [
      { str: 'AE', x: 50, y: 700, width: 12, height: 12, page: 1 },
      { str: '0012', x: 63, y: 700, width: 24, height: 12, page: 1 },
    ];

    expect(buildRowText(items)).toBe('AE0012');
  });
});
