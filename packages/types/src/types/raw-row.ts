export type RawValue = string | number;

/**
 * Candidate transaction as an extractor emits it, before any coercion.
 *
 * Polarity is carried by which key is set:
 * - `withdrawal` / `deposit` for layouts with separate columns or an
 *   interpreted CR/DR indicator,
 * - `amount` for a single signed column (negative is a withdrawal),
 * - `unsignedAmount` when the layout gives no way to tell. Such rows are
 *   reported and dropped by the normalizer.
 */
export interface RawRow {
  /** 1-indexed page (or sheet) the row was read from */
  page: number;
  /** Raw date token, exactly as printed */
  date: string;
  withdrawal?: RawValue | undefined;
  deposit?: RawValue | undefined;
  amount?: RawValue | undefined;
  unsignedAmount?: RawValue | undefined;
  /** Running balance printed on the row, if the layout has one */
  balance?: RawValue | undefined;
  payee?: string | undefined;
  description?: string | undefined;
  reference?: string | undefined;
  /** Source text the row was built from, kept for diagnostics */
  source: string;
}
