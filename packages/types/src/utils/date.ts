/**
 * Statement date formats. All dates are day-first; a bank's profile lists the
 * formats it prints, in the order they should be tried.
 */
export type DateFormat =
  | 'DD/MM/YYYY'
  | 'DD-MM-YYYY'
  | 'DD.MM.YYYY'
  | 'DD/MM/YY'
  | 'DD-MMM-YYYY'
  | 'DD MMM YYYY'
  | 'DD-MMM-YY'
  | 'DDMMMYY'
  | 'YYYY-MM-DD'
  | 'MMM DD, YYYY';

interface FormatRule {
  pattern: RegExp;
  /** Capture group index for each part */
  day: number;
  month: number;
  year: number;
  monthIsName: boolean;
}

const MONTH = '([A-Za-z]{3,9})';

const FORMAT_RULES: Record<DateFormat, FormatRule> = {
  'DD/MM/YYYY': { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, day: 1, month: 2, year: 3, monthIsName: false },
  'DD-MM-YYYY': { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, day: 1, month: 2, year: 3, monthIsName: false },
  'DD.MM.YYYY': { pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/, day: 1, month: 2, year: 3, monthIsName: false },
  'DD/MM/YY': { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/, day: 1, month: 2, year: 3, monthIsName: false },
  'DD-MMM-YYYY': { pattern: new RegExp(`^(\\d{1,2})-${MONTH}-(\\d{4})$`), day: 1, month: 2, year: 3, monthIsName: true },
  'DD MMM YYYY': { pattern: new RegExp(`^(\\d{1,2})\\s+${MONTH},?\\s+(\\d{4})$`), day: 1, month: 2, year: 3, monthIsName: true },
  'DD-MMM-YY': { pattern: new RegExp(`^(\\d{1,2})-${MONTH}-(\\d{2})$`), day: 1, month: 2, year: 3, monthIsName: true },
  'DDMMMYY': { pattern: /^(\d{2})([A-Za-z]{3})(\d{2})$/, day: 1, month: 2, year: 3, monthIsName: true },
  'YYYY-MM-DD': { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, day: 3, month: 2, year: 1, monthIsName: false },
  'MMM DD, YYYY': { pattern: new RegExp(`^${MONTH}\\s+(\\d{1,2}),?\\s+(\\d{4})$`), day: 2, month: 1, year: 3, monthIsName: true },
};

/** Formats tried after a bank's own list. */
export const FALLBACK_DATE_FORMATS: readonly DateFormat[] = [
  'DD/MM/YYYY',
  'DD-MM-YYYY',
  'YYYY-MM-DD',
  'DD MMM YYYY',
  'DD-MMM-YYYY',
];

export const ALL_DATE_FORMATS: readonly DateFormat[] = [
  'DD/MM/YYYY',
  'DD-MM-YYYY',
  'DD.MM.YYYY',
  'DD/MM/YY',
  'DD-MMM-YYYY',
  'DD MMM YYYY',
  'DD-MMM-YY',
  'DDMMMYY',
  'YYYY-MM-DD',
  'MMM DD, YYYY',
];

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const FULL_MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

export function monthNameToNumber(monthName: string): number | undefined {
  const lower = monthName.toLowerCase();
  const short = MONTHS[lower];
  if (short !== undefined) return short;
  const index = FULL_MONTHS.indexOf(lower);
  return index >= 0 ? index + 1 : undefined;
}

function toISO(year: number, month: number, day: number): string | undefined {
  if (month < 1 || month > 12 || day < 1) return undefined;
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) return undefined;
  return `${year.toString().padStart(4, '0')}-${month.toString().padStart(2, '0')}-${day.toString().padStart(2, '0')}`;
}

function applyRule(token: string, rule: FormatRule): string | undefined {
  const match = rule.pattern.exec(token);
  if (match === null) return undefined;

  const dayPart = match[rule.day];
  const monthPart = match[rule.month];
  const yearPart = match[rule.year];
  if (dayPart === undefined || monthPart === undefined || yearPart === undefined) return undefined;

  const month = rule.monthIsName ? monthNameToNumber(monthPart) : parseInt(monthPart, 10);
  if (month === undefined) return undefined;

  const year = yearPart.length === 2 ? 2000 + parseInt(yearPart, 10) : parseInt(yearPart, 10);
  return toISO(year, month, parseInt(dayPart, 10));
}

/**
 * Parse a date token with the first format that matches the whole token.
 * Returns an ISO date (YYYY-MM-DD), or undefined if no format applies.
 */
export function tryParseDate(token: string, formats: readonly DateFormat[]): string | undefined {
  const trimmed = token.trim().replace(/\s+/g, ' ');
  if (trimmed.length === 0) return undefined;

  for (const format of formats) {
    const iso = applyRule(trimmed, FORMAT_RULES[format]);
    if (iso !== undefined) return iso;
  }
  return undefined;
}

export function isValidISODate(dateStr: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateStr);
  if (match === null) return false;
  return toISO(Number(match[1]), Number(match[2]), Number(match[3])) === dateStr;
}

export type DisplayDateFormat = 'iso' | 'dmy';

/** `dmy` renders DD-MM-YYYY, the layout statement users expect in exports. */
export function formatDisplayDate(iso: string, format: DisplayDateFormat = 'dmy'): string {
  if (format === 'iso') return iso;
  const [year, month, day] = iso.split('-');
  if (year === undefined || month === undefined || day === undefined) return iso;
  return `${day}-${month}-${year}`;
}
