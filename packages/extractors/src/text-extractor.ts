/**
 * Text-anchored layouts: a row starts at a line matching the bank's leading
 * pattern and runs until the next row start, the end of the page, or a
 * break line. The bank parses each block.
 */
import type { ExtractionStrategy, RawDocument, RawPage, RawRow } from '@statement-kit/types';
import { BaseExtractor } from './base-extractor.js';
import { collapseWhitespace } from './helpers/text.js';

export interface TextAnchor {
  page: RawPage;
}

export interface TextBlock {
  page: number;
  /** First line is the row start; the rest are continuation lines */
  lines: string[];
}

/** Continuation lines that are never part of a description. */
export const DEFAULT_NOISE: readonly RegExp[] = [
  /^page\s*\d+(?:\s*(?:of|\/)\s*\d+)?$/i,
  /^(?:opening|closing|available)\s+balance\b/i,
  /^(?:statement|iban|account|summary)\b/i,
  /^(?:sub\s*)?totals?\b/i,
];

export abstract class TextExtractor<S> extends BaseExtractor<TextAnchor> {
  readonly strategy: ExtractionStrategy = 'text';

  /** Start of a transaction row. */
  protected abstract readonly rowStart: RegExp;

  /** Continuation lines skipped without ending the block. */
  protected readonly ignoreLines: readonly RegExp[] = DEFAULT_NOISE;

  /** Lines that end the current block (footers, carried-forward lines). */
  protected readonly breakLines: readonly RegExp[] = [];

  /** Per-pass state, e.g. the previous running balance. */
  protected abstract createState(doc: RawDocument): S;

  /**
   * Turn one block into a candidate row; null skips the block (a header
   * line that happens to start like a row).
   */
  protected abstract parseBlock(block: TextBlock, state: S): RawRow | null;

  /**
   * Called for lines outside any block: the preamble of a page and break
   * lines. Layouts use it to pick up an opening balance.
   */
  protected onPreambleLine(_line: string, _state: S): void {
    // Most layouts keep nothing from the preamble
  }

  protected describeLayout(): string {
    return `lines starting with ${this.rowStart.source}`;
  }

  protected locate(doc: RawDocument): TextAnchor[] {
    return doc.pages
      .filter((page) => page.lines.some((line) => this.rowStart.test(collapseWhitespace(line))))
      .map((page) => ({ page }));
  }

  protected *rows(doc: RawDocument, anchors: TextAnchor[]): Generator<RawRow> {
    const state = this.createState(doc);

    for (const { page } of anchors) {
      let block: TextBlock | null = null;

      for (const rawLine of page.lines) {
        const line = collapseWhitespace(rawLine);
        if (line === '') continue;

        if (this.rowStart.test(line)) {
          if (block !== null) {
            const row = this.parseBlock(block, state);
            if (row !== null) yield row;
          }
          block = { page: page.pageNumber, lines: [line] };
          continue;
        }

        if (this.breakLines.some((pattern) => pattern.test(line))) {
          if (block !== null) {
            const row = this.parseBlock(block, state);
            if (row !== null) yield row;
            block = null;
          }
          this.onPreambleLine(line, state);
          continue;
        }

        if (block === null) {
          this.onPreambleLine(line, state);
          continue;
        }

        if (this.ignoreLines.some((pattern) => pattern.test(line))) continue;
        block.lines.push(line);
      }

      if (block !== null) {
        const row = this.parseBlock(block, state);
        if (row !== null) yield row;
      }
    }
  }
}
