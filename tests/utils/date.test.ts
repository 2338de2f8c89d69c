import { describe, it, expect } from 'vitest';
import {
  ALL_DATE_FORMATS,
  formatDisplayDate,
  isValidISODate,
  tryParseDate,
} from '@statement-kit/types';

describe('tryParseDate', () => {
  it('parses day-first numeric dates', () => {
    expect(tryParseDate('01/02/2024', ['DD/MM/YYYY'])).toBe('2024-02-01');
    expect(tryParseDate('5-3-2024', ['DD-MM-YYYY'])).toBe('2024-03-05');
    expect(tryParseDate('31.12.2023', ['DD.MM.YYYY'])).toBe('2023-12-31');
  });

  it('maps two-digit years to 20YY', () => {
    expect(tryParseDate('02NOV25', ['DDMMMYY'])).toBe('2025-11-02');
    expect(tryParseDate('15/06/24', ['DD/MM/YY'])).toBe('2024-06-15');
  });

  it('accepts abbreviated and full month names in any case', () => {
    expect(tryParseDate('07-Jan-2024', ['DD-MMM-YYYY'])).toBe('2024-01-07');
    expect(tryParseDate('07 september 2024', ['DD MMM YYYY'])).toBe('2024-09-07');
    expect(tryParseDate('Feb 01, 2024', ['MMM DD, YYYY'])).toBe('2024-02-01');
  });

  it('uses the first format that matches the whole token', () => {
    expect(tryParseDate('2024-02-01', ['DD/MM/YYYY', 'YYYY-MM-DD'])).toBe('2024-02-01');
    expect(tryParseDate('01/02/2024 extra', ['DD/MM/YYYY'])).toBeUndefined();
  });

  it('rejects impossible calendar dates', () => {
    expect(tryParseDate('31/02/2024', ALL_DATE_FORMATS)).toBeUndefined();
    expect(tryParseDate('29/02/2024', ['DD/MM/YYYY'])).toBe('2024-02-29');
    expect(tryParseDate('29/02/2023', ['DD/MM/YYYY'])).toBeUndefined();
  });

  it('returns undefined for blank tokens', () => {
    expect(tryParseDate('   ', ALL_DATE_FORMATS)).toBeUndefined();
  });
});

describe('formatDisplayDate', () => {
  it('renders DD-MM-YYYY by default', () => {
    expect(formatDisplayDate('2024-02-01')).toBe('01-02-2024');
  });

  it('keeps ISO dates for iso', () => {
    expect(formatDisplayDate('2024-02-01', 'iso')).toBe('2024-02-01');
  });
});

describe('isValidISODate', () => {
  it('checks shape and calendar', () => {
    expect(isValidISODate('2024-02-29')).toBe(true);
    expect(isValidISODate('2024-2-29')).toBe(false);
    expect(isValidISODate('2023-02-29')).toBe(false);
  });
});
