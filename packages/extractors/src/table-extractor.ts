/**
 * Table-anchored layouts: the loader's grid view, a header row found through
 * the synonym table, and one transaction per data row.
 */
import type { ExtractionStrategy, HeaderField, RawDocument, RawRow } from '@statement-kit/types';
import { isBlankAmount, looksLikeHeaderRow, matchHeaderField } from '@statement-kit/types';
import { BaseExtractor } from './base-extractor.js';
import { balanceCell, stripIndicator } from './helpers/amounts.js';
import { collapseWhitespace } from './helpers/text.js';

export type ColumnMap = Partial<Record<HeaderField, number>>;

/** A set of amount columns that together carry polarity. */
export type AmountLayout = readonly HeaderField[];

export interface TableAnchor {
  page: number;
  grid: string[][];
  headerIndex: number;
  columns: ColumnMap;
  amountLayout: AmountLayout;
}

/** Rows that sit inside the table but are not transactions. */
const SUMMARY_ROW =
  /\b(?:opening|closing|previous|available)\s+balance\b|\b(?:brought|carried)\s+forward\b|^(?:sub\s*)?totals?\b|\bpage\s+\d+\s*(?:of|\/)\s*\d+\b|الرصيد الافتتاحي|الرصيد الختامي/i;

const SIGNED_LAYOUT: AmountLayout = ['amount'];
const SPLIT_LAYOUT: AmountLayout = ['withdrawal', 'deposit'];

export function cellAt(cells: readonly string[], index: number | undefined): string {
  if (index === undefined) return '';
  return collapseWhitespace(cells[index] ?? '');
}

/**
 * Map header labels to fields. The first column naming a field wins.
 */
export function mapColumns(cells: readonly string[]): ColumnMap {
  const columns: ColumnMap = {};
  cells.forEach((cell, index) => {
    const field = matchHeaderField(cell);
    if (field !== undefined && columns[field] === undefined) {
      columns[field] = index;
    }
  });
  return columns;
}

function amountCell(cell: string): string | undefined {
  if (isBlankAmount(cell)) return undefined;
  return stripIndicator(cell).value;
}

/** Single amount column: a `Dr` indicator makes the value negative. */
function signedCell(cell: string): string | undefined {
  if (isBlankAmount(cell)) return undefined;
  const { value, indicator } = stripIndicator(cell);
  if (indicator === 'DR' && !value.startsWith('-')) return `-${value}`;
  return value;
}

function hasAmounts(row: RawRow): boolean {
  return row.withdrawal !== undefined || row.deposit !== undefined || row.amount !== undefined;
}

export abstract class TableExtractor extends BaseExtractor<TableAnchor> {
  readonly strategy: ExtractionStrategy = 'table';

  /** Fields the header must name besides one of the amount layouts. */
  protected abstract readonly requiredFields: readonly HeaderField[];

  /** Accepted amount column sets; the first one the header satisfies is used. */
  protected readonly amountLayouts: readonly AmountLayout[] = [SPLIT_LAYOUT, SIGNED_LAYOUT];

  /** Rows of a grid searched for the header. */
  protected readonly headerSearchDepth: number = 5;

  /** Drop rows identical to one already produced. */
  protected readonly dedupe: boolean = false;

  protected describeLayout(): string {
    const amounts = this.amountLayouts.map((layout) => layout.join('/')).join(' or ');
    return `a table whose header names ${this.requiredFields.join(', ')} and ${amounts}`;
  }

  protected locate(doc: RawDocument): TableAnchor[] {
    const anchors: TableAnchor[] = [];
    for (const page of doc.pages) {
      for (const grid of page.tables) {
        const anchor = this.findHeader(grid, page.pageNumber);
        if (anchor !== undefined) anchors.push(anchor);
      }
    }
    return anchors;
  }

  private findHeader(grid: string[][], page: number): TableAnchor | undefined {
    const depth = Math.min(this.headerSearchDepth, grid.length);
    for (let headerIndex = 0; headerIndex < depth; headerIndex++) {
      const cells = grid[headerIndex];
      if (cells === undefined) continue;

      const columns = mapColumns(cells);
      if (!this.requiredFields.every((field) => columns[field] !== undefined)) continue;

      const amountLayout = this.amountLayouts.find((layout) =>
        layout.every((field) => columns[field] !== undefined)
      );
      if (amountLayout === undefined) continue;

      return { page, grid, headerIndex, columns, amountLayout };
    }
    return undefined;
  }

  protected *rows(_doc: RawDocument, anchors: TableAnchor[]): Generator<RawRow> {
    const seen = new Set<string>();

    const emit = (row: RawRow): boolean => {
      if (!this.dedupe) return true;
      const key = JSON.stringify([row.date, row.withdrawal, row.deposit, row.amount, row.balance, row.description, row.reference]);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    };

    for (const anchor of anchors) {
      let pending: RawRow | null = null;

      for (let index = anchor.headerIndex + 1; index < anchor.grid.length; index++) {
        const cells = anchor.grid[index];
        if (cells === undefined) continue;

        const joined = collapseWhitespace(cells.join(' '));
        if (joined === '') continue;
        // Headers repeat on every page of a long table
        if (looksLikeHeaderRow(cells)) continue;
        if (SUMMARY_ROW.test(joined)) continue;

        const row = this.buildRow(cells, anchor);
        if (row.date === '' && !hasAmounts(row) && pending === null) continue;

        if (row.date === '' && pending !== null) {
          if (!hasAmounts(row)) {
            pending = this.mergeContinuation(pending, row);
            continue;
          }
          // Amounts printed on the line below the date
          if (!hasAmounts(pending)) {
            pending = { ...this.mergeContinuation(pending, row), ...pickAmounts(row) };
            continue;
          }
        }

        if (pending !== null && emit(pending)) yield pending;
        pending = row;
      }

      if (pending !== null && emit(pending)) yield pending;
    }
  }

  /**
   * One grid row as a candidate. Layouts with extra columns override this.
   */
  protected buildRow(cells: readonly string[], anchor: TableAnchor): RawRow {
    const get = (field: HeaderField): string => cellAt(cells, anchor.columns[field]);
    const description = get('description');
    const balance = get('balance');
    const payee = get('payee');

    const row: RawRow = {
      page: anchor.page,
      date: get('date'),
      description,
      payee: payee === '' ? undefined : payee,
      reference: this.referenceFor(cells, anchor, description),
      balance: isBlankAmount(balance) ? undefined : balanceCell(balance),
      source: collapseWhitespace(cells.join(' | ')),
    };

    if (anchor.amountLayout.includes('amount')) {
      row.amount = signedCell(get('amount'));
    } else {
      row.withdrawal = amountCell(get('withdrawal'));
      row.deposit = amountCell(get('deposit'));
    }
    return row;
  }

  protected referenceFor(cells: readonly string[], anchor: TableAnchor, _description: string): string | undefined {
    const reference = cellAt(cells, anchor.columns.reference);
    return reference === '' ? undefined : reference;
  }

  protected mergeContinuation(pending: RawRow, continuation: RawRow): RawRow {
    const description = collapseWhitespace(`${pending.description ?? ''} ${continuation.description ?? ''}`);
    return {
      ...pending,
      description,
      reference: pending.reference ?? continuation.reference,
      source: `${pending.source}\n${continuation.source}`,
    };
  }
}

function pickAmounts(row: RawRow): Partial<RawRow> {
  return {
    withdrawal: row.withdrawal,
    deposit: row.deposit,
    amount: row.amount,
    balance: row.balance,
  };
}
