/**
 * Column detection utilities for layout-aware PDF parsing.
 * Detects and maps columns in tabular data from a header row's positions.
 */
import type { TextItem } from '@statement-kit/types';
import type { Row } from './rows.js';

/**
 * A detected column with its boundaries.
 */
export interface Column {
  /** Header label as printed */
  name: string;
  /** Left X boundary (inclusive) */
  left: number;
  /** Right X boundary (exclusive) */
  right: number;
  index: number;
}

// Header words closer than this belong to one label ("Value" "Date")
const HEADER_WORD_GAP = 6;

// Amounts are right-aligned under their header, so they are placed by centre
const NUMERIC_CELL = /^[-+(]?[\d,]+\.\d{2}\)?(?:\s*(?:cr|dr)\.?)?$/i;

/**
 * Merge header items that are separated by word spacing into single labels.
 */
export function mergeHeaderItems(items: TextItem[]): TextItem[] {
  const sorted = [...items].sort((a, b) => a.x - b.x);
  const merged: TextItem[] = [];

  for (const item of sorted) {
    const last = merged[merged.length - 1];
    if (last !== undefined && item.x - (last.x + last.width) <= HEADER_WORD_GAP) {
      merged[merged.length - 1] = {
        ...last,
        str: `${last.str} ${item.str}`,
        width: item.x + item.width - last.x,
      };
    } else {
      merged.push({ ...item });
    }
  }

  return merged;
}

/**
 * Detect columns from header labels. Boundaries sit halfway between the
 * centres of neighbouring labels; the outer columns are open-ended.
 */
export function detectColumnsFromHeader(headerItems: TextItem[]): Column[] {
  const centres = headerItems.map((item) => item.x + item.width / 2);

  return headerItems.map((item, index) => {
    const centre = centres[index] ?? item.x;
    const prevCentre = centres[index - 1];
    const nextCentre = centres[index + 1];
    return {
      name: item.str.trim(),
      left: prevCentre === undefined ? Number.NEGATIVE_INFINITY : (prevCentre + centre) / 2,
      right: nextCentre === undefined ? Number.POSITIVE_INFINITY : (centre + nextCentre) / 2,
      index,
    };
  });
}

/**
 * Map a text item to its column. Numeric cells are placed by their centre,
 * text cells by their left edge.
 *
 * @returns Column index, or -1 if not in any column
 */
export function getColumnForItem(item: TextItem, columns: Column[]): number {
  const x = NUMERIC_CELL.test(item.str.trim()) ? item.x + item.width / 2 : item.x;
  for (const col of columns) {
    if (x >= col.left && x < col.right) {
      return col.index;
    }
  }
  return -1;
}

/**
 * Map a row's items to columns.
 *
 * @returns One string per column (empty string if no item in column)
 */
export function mapRowToColumns(row: Row, columns: Column[]): string[] {
  const result: string[] = columns.map(() => '');

  for (const item of row.items) {
    const colIndex = getColumnForItem(item, columns);
    const current = result[colIndex];
    if (current === undefined) continue;
    // Append to existing content (for multi-item columns)
    result[colIndex] = current === '' ? item.str : `${current} ${item.str}`;
  }

  return result;
}
