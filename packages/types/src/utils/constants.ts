export const PARSER_VERSION = '0.1.0';

/** Column order every export renders. */
export const CANONICAL_COLUMNS = [
  'Date',
  'Withdrawals',
  'Deposits',
  'Payee',
  'Description',
  'Reference Number',
] as const;

export type CanonicalColumn = typeof CANONICAL_COLUMNS[number];

export const DEFAULT_BALANCE_TOLERANCE = 0.01;

export const DEFAULT_MIN_RECONCILED_ROWS = 3;

export const DEFAULT_MAX_PAGES = 1000;

/** Rows scanned for a header in spreadsheet exports. */
export const SPREADSHEET_HEADER_SEARCH_DEPTH = 30;
