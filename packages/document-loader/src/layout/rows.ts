/**
 * Row clustering utilities for layout-aware PDF parsing.
 * Groups text items into rows based on Y-coordinate proximity.
 */
import type { TextItem } from '@statement-kit/types';

/**
 * A row of text items, sorted by X coordinate.
 */
export interface Row {
  /** Y coordinate of the row (average of items) */
  y: number;
  page: number;
  /** Text items in this row, sorted by X */
  items: TextItem[];
  /** Row text with spaces for small gaps and tabs for column gaps */
  text: string;
}

// Gap thresholds in PDF points
const SPACE_GAP = 2.5;
const COLUMN_GAP = 18;

/**
 * Group text items into rows based on Y-coordinate proximity.
 * Items within yTolerance of each other are considered part of the same row.
 *
 * @returns Rows in reading order: page by page, top to bottom
 */
export function groupByRows(items: TextItem[], yTolerance: number = 3.0): Row[] {
  if (items.length === 0) return [];

  // Group items by page first
  const byPage = new Map<number, TextItem[]>();
  for (const item of items) {
    const pageItems = byPage.get(item.page) ?? [];
    pageItems.push(item);
    byPage.set(item.page, pageItems);
  }

  const allRows: Row[] = [];
  const pages = [...byPage.keys()].sort((a, b) => a - b);

  for (const page of pages) {
    const pageItems = byPage.get(page) ?? [];
    // Sort by Y descending (PDF coordinates: higher Y = higher on page)
    const sorted = [...pageItems].sort((a, b) => b.y - a.y || a.x - b.x);

    let currentRow: TextItem[] = [];
    let currentY = sorted[0]?.y ?? 0;

    for (const item of sorted) {
      if (Math.abs(item.y - currentY) <= yTolerance) {
        currentRow.push(item);
      } else {
        if (currentRow.length > 0) {
          allRows.push(createRow(currentRow, page));
        }
        currentRow = [item];
        currentY = item.y;
      }
    }

    if (currentRow.length > 0) {
      allRows.push(createRow(currentRow, page));
    }
  }

  return allRows;
}

function createRow(items: TextItem[], page: number): Row {
  const sorted = [...items].sort((a, b) => a.x - b.x);
  const avgY = items.reduce((sum, item) => sum + item.y, 0) / items.length;

  return {
    y: avgY,
    page,
    items: sorted,
    text: buildRowText(sorted),
  };
}

/**
 * Join sorted items: a small gap becomes a space, a column-sized gap a tab.
 */
export function buildRowText(sortedItems: TextItem[]): string {
  let out = '';
  let prevEndX: number | null = null;

  for (const item of sortedItems) {
    if (!item.str) continue;

    if (prevEndX !== null) {
      const gap = item.x - prevEndX;
      if (gap > COLUMN_GAP) {
        out += '\t';
      } else if (gap > SPACE_GAP) {
        out += ' ';
      }
    }

    out += item.str;
    prevEndX = item.x + item.width;
  }

  return out.replace(/[ \t]+$/g, '');
}

/**
 * Text lines for a set of rows, skipping rows that carry no text.
 */
export function rowsToLines(rows: Row[]): string[] {
  return rows.map((row) => row.text).filter((text) => text.length > 0);
}
