/**
 * In-memory documents for extractor and converter tests.
 */
import type { RawDocument, RawPage, RawRow } from '@statement-kit/types';

export function textPage(pageNumber: number, lines: string[], tables: string[][][] = []): RawPage {
  return { pageNumber, text: lines.join('\n'), lines, tables, items: [] };
}

/** PDF-like document with one entry of lines per page. */
export function textDocument(...pages: string[][]): RawDocument {
  return {
    kind: 'pdf',
    pages: pages.map((lines, index) => textPage(index + 1, lines)),
    totalPages: pages.length,
    encrypted: false,
    metadata: {},
    warnings: [],
  };
}

/** PDF-like document whose single page carries a title line and one grid. */
export function tableDocument(title: string, grid: string[][], kind: RawDocument['kind'] = 'pdf'): RawDocument {
  const lines = [title, ...grid.map((cells) => cells.filter((cell) => cell !== '').join('\t'))];
  return {
    kind,
    pages: [textPage(1, lines, [grid])],
    totalPages: 1,
    encrypted: false,
    metadata: {},
    warnings: [],
  };
}

export function rawRow(fields: Partial<RawRow> & { date: string }): RawRow {
  return { page: 1, source: fields.date, ...fields };
}
