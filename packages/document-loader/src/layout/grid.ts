/**
 * Table reconstruction: every header row opens a grid whose columns come
 * from the header's label positions. The grid runs until the next header
 * or the end of the page.
 */
import { looksLikeHeaderRow } from '@statement-kit/types';
import { detectColumnsFromHeader, mapRowToColumns, mergeHeaderItems, type Column } from './columns.js';
import type { Row } from './rows.js';

/**
 * Build table grids from one page's rows. The first row of each grid is the
 * header labels.
 */
export function buildTableGrids(rows: Row[]): string[][][] {
  const grids: string[][][] = [];
  let columns: Column[] | null = null;
  let current: string[][] | null = null;
  let page: number | null = null;

  for (const row of rows) {
    if (page !== null && row.page !== page) {
      columns = null;
      current = null;
    }
    page = row.page;

    const labels = mergeHeaderItems(row.items);
    if (looksLikeHeaderRow(labels.map((label) => label.str))) {
      columns = detectColumnsFromHeader(labels);
      current = [columns.map((column) => column.name)];
      grids.push(current);
      continue;
    }

    if (columns === null || current === null) continue;

    const cells = mapRowToColumns(row, columns);
    if (cells.some((cell) => cell !== '')) {
      current.push(cells);
    }
  }

  return grids;
}
