/**
 * Base Extractor
 *
 * Locates the layout's anchors eagerly, so a wrong layout fails before any
 * row is produced, then reads rows lazily from the anchors.
 */
import type { ExtractionStrategy, ExtractorId, RawDocument, RawRow } from '@statement-kit/types';
import { FormatMismatchError, logger } from '@statement-kit/types';
import { documentText } from './helpers/text.js';
import { restartable } from './restartable.js';
import type { Extractor } from './types.js';

export abstract class BaseExtractor<TAnchor> implements Extractor {
  abstract readonly id: ExtractorId;
  abstract readonly strategy: ExtractionStrategy;

  /**
   * Bank name or product as printed on the statement. Auto-detection
   * requires it in addition to the layout anchors; null skips the check.
   */
  protected abstract readonly signature: RegExp | null;

  /** What the layout looks like, for the mismatch message. */
  protected abstract describeLayout(): string;

  /**
   * Find the places in the document this layout reads from. Must not
   * mutate the document.
   */
  protected abstract locate(doc: RawDocument): TAnchor[];

  /**
   * Produce rows from the located anchors, in document order.
   */
  protected abstract rows(doc: RawDocument, anchors: TAnchor[]): Generator<RawRow>;

  extract(doc: RawDocument): Iterable<RawRow> {
    const anchors = this.locate(doc);

    if (anchors.length === 0) {
      logger.debug('Layout anchors not found', { extractor: this.id, pages: doc.pages.length });
      throw new FormatMismatchError(
        this.id,
        `Document does not match the ${this.id} layout (${this.describeLayout()})`
      );
    }

    logger.debug('Layout anchors located', {
      extractor: this.id,
      strategy: this.strategy,
      anchors: anchors.length,
    });

    return restartable(() => this.rows(doc, anchors));
  }

  detect(doc: RawDocument): boolean {
    if (this.signature !== null && !this.signature.test(documentText(doc))) {
      return false;
    }
    return this.locate(doc).length > 0;
  }
}
