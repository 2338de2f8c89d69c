/**
 * Closed catalog of supported statement layouts. The UI bank picker and the
 * dispatcher share these identifiers.
 */
export const BANK_IDS = [
  'emirates-nbd',
  'emirates-nbd-v2',
  'emirates-islamic',
  'wio',
  'rakbank',
  'rakbank-credit-card',
  'dib',
  'banque-misr',
  'adcb',
  'adcb-v2',
  'adcb-credit-card',
  'adcb-account',
  'mashreq',
  'mashreq-v2',
  'uab',
  'pluto',
  'bank-of-baroda',
  'excel',
  'other',
] as const;

export type BankId = typeof BANK_IDS[number];

export type ExtractorId = Exclude<BankId, 'other'> | 'universal';

export type DocumentKind = 'pdf' | 'spreadsheet';

export type ExtractionStrategy = 'table' | 'text' | 'spreadsheet' | 'heuristic';

export function isBankId(value: string): value is BankId {
  return BANK_IDS.some((id) => id === value);
}
