/**
 * Column-label vocabulary shared by the loader (to spot header rows) and the
 * table extractors (to map grid columns onto canonical fields).
 */
import { readFileSync } from 'fs';
import { z } from 'zod';

export const HEADER_FIELDS = [
  'date',
  'valueDate',
  'description',
  'payee',
  'reference',
  'withdrawal',
  'deposit',
  'amount',
  'balance',
  'serial',
] as const;

export type HeaderField = typeof HEADER_FIELDS[number];

export type HeaderSynonyms = Record<HeaderField, readonly string[]>;

const SynonymFileSchema = z.object({
  date: z.array(z.string()),
  valueDate: z.array(z.string()),
  description: z.array(z.string()),
  payee: z.array(z.string()),
  reference: z.array(z.string()),
  withdrawal: z.array(z.string()),
  deposit: z.array(z.string()),
  amount: z.array(z.string()),
  balance: z.array(z.string()),
  serial: z.array(z.string()),
});

export function normalizeHeaderText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[._/\\()[\]\-:#*|]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function loadSynonyms(): HeaderSynonyms {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./header-synonyms.json', import.meta.url), 'utf8')
  );
  const parsed = SynonymFileSchema.parse(raw);
  const norm = (labels: string[]): string[] => labels.map(normalizeHeaderText);
  return {
    date: norm(parsed.date),
    valueDate: norm(parsed.valueDate),
    description: norm(parsed.description),
    payee: norm(parsed.payee),
    reference: norm(parsed.reference),
    withdrawal: norm(parsed.withdrawal),
    deposit: norm(parsed.deposit),
    amount: norm(parsed.amount),
    balance: norm(parsed.balance),
    serial: norm(parsed.serial),
  };
}

export const HEADER_SYNONYMS: HeaderSynonyms = loadSynonyms();

/**
 * Canonical field for a header label. Exact synonyms win over prefixes, so
 * "Transaction Date" is a date while "Transaction" alone is a description.
 */
export function matchHeaderField(
  label: string,
  synonyms: HeaderSynonyms = HEADER_SYNONYMS
): HeaderField | undefined {
  const norm = normalizeHeaderText(label);
  if (norm.length === 0) return undefined;

  for (const field of HEADER_FIELDS) {
    if (synonyms[field].includes(norm)) return field;
  }
  for (const field of HEADER_FIELDS) {
    if (synonyms[field].some((syn) => syn.length > 1 && norm.startsWith(`${syn} `))) return field;
  }
  return undefined;
}

/**
 * A row reads as a table header when at least three cells name distinct
 * fields and one of them is a date.
 */
export function looksLikeHeaderRow(cells: readonly string[]): boolean {
  const fields = new Set<HeaderField>();
  for (const cell of cells) {
    const field = matchHeaderField(cell);
    if (field !== undefined) fields.add(field);
  }
  return fields.size >= 3 && fields.has('date');
}
