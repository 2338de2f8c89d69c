/**
 * Tests for column detection utilities.
 */
import { describe, it, expect } from 'vitest';
import {
  detectColumnsFromHeader,
  getColumnForItem,
  mapRowToColumns,
  mergeHeaderItems,
} from '@statement-kit/document-loader';
import type { Row } from '@statement-kit/document-loader';
import type { TextItem } from '@statement-kit/types';

const item = (str: string, x: number, width: number, y = 700): TextItem => ({ str, x, y, width, height: 10, page: 1 });

const HEADER: TextItem[] = [
  item('Date', 50, 30),
  item('Description', 150, 80),
  item('Debit', 400, 30),
  item('Credit', 480, 35),
];

describe('mergeHeaderItems', () => {
  it('joins words of one label', () => {
    const merged = mergeHeaderItems([item('Value', 100, 25), item('Date', 128, 20), item('Narration', 200, 50)]);

    expect(merged.map((label) => label.str)).toEqual(['Value Date', 'Narration']);
    expect(merged[0]?.width).toBe(48);
  });
});

describe('detectColumnsFromHeader', () => {
  it('places boundaries halfway between label centres', () => {
    const columns = detectColumnsFromHeader(HEADER);

    expect(columns.map((column) => column.name)).toEqual(['Date', 'Description', 'Debit', 'Credit']);
    expect(columns[0]?.left).toBe(Number.NEGATIVE_INFINITY);
    expect(columns[0]?.right).toBe(127.5);
    expect(columns[1]?.right).toBe(302.5);
    expect(columns[2]?.right).toBe(456.25);
    expect(columns[3]?.right).toBe(Number.POSITIVE_INFINITY);
  });

  it('should handle an empty header', () => {
    expect(detectColumnsFromHeader([])).toHaveLength(0);
  });
});

describe('getColumnForItem', () => {
  const columns = detectColumnsFromHeader(HEADER);

  it('places amounts by their centre', () => {
    // Left edge falls under Description, centre under Debit
    expect(getColumnForItem(item('1,250.00', 296, 60), columns)).toBe(2);
    expect(getColumnForItem(item('5.00 Cr', 470, 40), columns)).toBe(3);
  });

  it('places text by its left edge', () => {
    expect(getColumnForItem(item('Transfer to savings account', 150, 200), columns)).toBe(1);
  });
});

describe('mapRowToColumns', () => {
  it('fills one cell per column and joins items sharing a column', () => {
    const row: Row = {
      y: 680,
      page: 1,
      items: [item('01/02/2024', 50, 45, 680), item('Card', 150, 20, 680), item('purchase', 175, 40, 680), item('12.50', 405, 25, 680)],
      text: '',
    };

    expect(mapRowToColumns(row, detectColumnsFromHeader(HEADER))).toEqual(['01/02/2024', 'Card purchase', '12.50', '']);
  });
});
