export {
  PARSER_VERSION,
  CANONICAL_COLUMNS,
  DEFAULT_BALANCE_TOLERANCE,
  DEFAULT_MIN_RECONCILED_ROWS,
  DEFAULT_MAX_PAGES,
  SPREADSHEET_HEADER_SEARCH_DEPTH,
  type CanonicalColumn,
} from './constants.js';
export {
  tryParseDate,
  monthNameToNumber,
  isValidISODate,
  formatDisplayDate,
  FALLBACK_DATE_FORMATS,
  ALL_DATE_FORMATS,
  type DateFormat,
  type DisplayDateFormat,
} from './date.js';
export {
  parseAmount,
  tryParseAmount,
  isBlankAmount,
  roundToTwoDecimals,
  formatAmount,
  sumAmounts,
} from './money.js';
export {
  HEADER_FIELDS,
  HEADER_SYNONYMS,
  normalizeHeaderText,
  matchHeaderField,
  looksLikeHeaderRow,
  type HeaderField,
  type HeaderSynonyms,
} from './headers.js';
