import type { ExtractionStrategy, ExtractorId, RawDocument, RawRow } from '@statement-kit/types';

/**
 * Turns a loaded document into candidate rows for one statement layout.
 */
export interface Extractor {
  readonly id: ExtractorId;
  readonly strategy: ExtractionStrategy;

  /**
   * Rows in document order. The iterable is lazy and can be iterated again;
   * each pass re-reads the document from the first page.
   *
   * @throws FormatMismatchError when the document does not carry this layout
   */
  extract(doc: RawDocument): Iterable<RawRow>;

  /** Cheap test used by auto-detection; never throws. */
  detect(doc: RawDocument): boolean;
}
