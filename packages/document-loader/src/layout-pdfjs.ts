/**
 * Layout-aware PDF extraction using pdfjs-dist.
 * Extracts text items with positional coordinates for row/column reconstruction.
 */
import type { TextItem } from '@statement-kit/types';
import { AuthenticationError, UnreadableDocumentError, logger } from '@statement-kit/types';

/**
 * Result of layout-aware PDF extraction.
 */
export interface LayoutExtractedPDF {
  /** All text items with positions */
  items: TextItem[];
  totalPages: number;
  encrypted: boolean;
  metadata: {
    title?: string | undefined;
    author?: string | undefined;
    creationDate?: string | undefined;
  };
}

export interface ExtractOptions {
  password?: string | undefined;
  /** Refuse documents with more pages than this */
  maxPages?: number | undefined;
}

/**
 * Internal interface for pdfjs text items.
 */
interface PdfjsTextItemLike {
  str: string;
  transform: number[];
  width?: number;
  height?: number;
}

interface MetadataSource {
  getMetadata(): Promise<{ info: unknown }>;
}

// pdfjs PasswordResponses
const INCORRECT_PASSWORD = 2;

/**
 * Extract text items from a PDF buffer. The buffer is copied, since pdfjs
 * transfers the one it is given to its worker.
 */
export async function extractTextItemsFromBuffer(
  buffer: Uint8Array,
  options: ExtractOptions = {}
): Promise<LayoutExtractedPDF> {
  // Dynamic import for pdfjs-dist (ESM compatibility)
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(buffer),
    password: options.password,
    useSystemFonts: true,
    isEvalSupported: false,
  });

  try {
    const pdfDocument = await loadingTask.promise.catch((error: unknown) => {
      throw toLoaderError(error);
    });

    const numPages = pdfDocument.numPages;
    if (numPages === 0) {
      throw new UnreadableDocumentError('PDF has no pages');
    }
    if (options.maxPages !== undefined && numPages > options.maxPages) {
      throw new UnreadableDocumentError(
        `PDF has ${numPages} pages; the limit is ${options.maxPages}`,
        'Split the statement into smaller files'
      );
    }

    const items: TextItem[] = [];
    for (let pageNum = 1; pageNum <= numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();
      const contentItems: readonly unknown[] = textContent.items;

      for (const item of contentItems) {
        // Marked-content entries carry no text
        if (!isTextItem(item)) continue;

        const str = item.str.trim();
        if (str.length === 0) continue;

        // Transform matrix: [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const transform = item.transform;
        const x = Number(transform[4]) || 0;
        const y = Number(transform[5]) || 0;
        const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * str.length * 0.6;
        const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);

        items.push({ str, x, y, width, height, page: pageNum });
      }
      page.cleanup();
    }

    const info = await readInfo(pdfDocument);
    return {
      items,
      totalPages: numPages,
      encrypted: readInfoString(info, 'EncryptFilterName') !== undefined,
      metadata: {
        title: readInfoString(info, 'Title'),
        author: readInfoString(info, 'Author'),
        creationDate: readInfoString(info, 'CreationDate'),
      },
    };
  } finally {
    await loadingTask.destroy();
  }
}

async function readInfo(pdfDocument: MetadataSource): Promise<unknown> {
  try {
    const { info } = await pdfDocument.getMetadata();
    return info;
  } catch (error) {
    // A broken info dictionary does not stop text extraction
    logger.warn('PDF metadata could not be read', { error: String(error) });
    return undefined;
  }
}

function readInfoString(info: unknown, key: string): string | undefined {
  if (typeof info !== 'object' || info === null || !(key in info)) return undefined;
  const value: unknown = Reflect.get(info, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Map a pdfjs loading failure onto the typed error taxonomy.
 */
export function toLoaderError(error: unknown): Error {
  if (error instanceof AuthenticationError || error instanceof UnreadableDocumentError) {
    return error;
  }

  if (readErrorField(error, 'name') === 'PasswordException') {
    const reason = readErrorField(error, 'code') === INCORRECT_PASSWORD ? 'incorrect' : 'missing';
    return new AuthenticationError(reason, { cause: error });
  }

  const message = readErrorField(error, 'message');
  return new UnreadableDocumentError(
    typeof message === 'string' && message.length > 0
      ? `PDF could not be read: ${message}`
      : 'PDF could not be read',
    undefined,
    { cause: error }
  );
}

function readErrorField(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null || !(key in error)) return undefined;
  return Reflect.get(error, key);
}

/**
 * Type guard to check if an item is a TextItem (has str property).
 */
function isTextItem(item: unknown): item is PdfjsTextItemLike {
  if (typeof item !== 'object' || item === null) return false;
  if (!('str' in item) || !('transform' in item)) return false;
  return typeof item.str === 'string' && Array.isArray(item.transform);
}
