import type { RawDocument } from '@statement-kit/types';

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** All page text, for signature checks. */
export function documentText(doc: RawDocument): string {
  return doc.pages.map((page) => page.text).join('\n');
}

const REFERENCE_PATTERNS: readonly RegExp[] = [
  // Ref#998877, Ref: 998877, REF NO 998877
  /\bRef(?:erence)?(?:\s*(?:No\.?|Number))?(?:\s*[#:.]\s*|\s+)([A-Za-z0-9/-]*\d[A-Za-z0-9/-]*)/i,
  // Emirates-style transfer references
  /\b(AE\d{6,})\b/,
  // Long digit runs that are not part of an amount or date
  /(?<![\d.,/-])(\d{6,})(?![\d.,/-])/,
];

/**
 * First reference-looking token in a text, in order of confidence.
 */
export function extractReference(text: string): string | undefined {
  for (const pattern of REFERENCE_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1] !== undefined) return match[1];
  }
  return undefined;
}

/**
 * Remove an explicit `Ref#…` label and its value from a description.
 */
export function stripReferenceLabel(text: string): string {
  return text.replace(/\bRef(?:erence)?(?:\s*(?:No\.?|Number))?(?:\s*[#:.]\s*|\s+)[A-Za-z0-9/-]*\d[A-Za-z0-9/-]*/gi, ' ');
}
