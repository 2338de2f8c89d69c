/**
 * Normalizer
 *
 * Coerces candidate rows into canonical transactions. Every row either
 * becomes a transaction or is dropped with a diagnostic; repairs are
 * reported too. Nothing is discarded silently.
 */
import type {
  BankId,
  DateFormat,
  Diagnostic,
  DiagnosticReason,
  ExtractionResult,
  ExtractorId,
  RawRow,
  RawValue,
  Transaction,
} from '@statement-kit/types';
import {
  DEFAULT_BALANCE_TOLERANCE,
  FALLBACK_DATE_FORMATS,
  PARSER_VERSION,
  TransactionSchema,
  isBlankAmount,
  roundToTwoDecimals,
  tryParseAmount,
  tryParseDate,
} from '@statement-kit/types';

export interface NormalizeContext {
  bankId: BankId;
  extractor: ExtractorId;
  /** Bank formats, tried before the generic fallbacks */
  dateFormats: readonly DateFormat[];
  pages: number;
  fallback?: boolean;
  warnings?: readonly string[];
  balanceTolerance?: number;
}

export type NormalizeOutcome =
  | { kind: 'transaction'; row: number; transaction: Transaction; balance: number | null }
  | { kind: 'diagnostic'; diagnostic: Diagnostic };

class RowRejected extends Error {
  constructor(
    readonly reason: DiagnosticReason,
    message: string
  ) {
    super(message);
    this.name = 'RowRejected';
  }
}

function collapse(text: string | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

function diagnostic(
  index: number,
  row: RawRow,
  action: Diagnostic['action'],
  reason: DiagnosticReason,
  message: string
): NormalizeOutcome {
  return {
    kind: 'diagnostic',
    diagnostic: { row: index, page: row.page, action, reason, message, source: row.source },
  };
}

/** A column value as a number; blank is absent. */
function amountOf(value: RawValue | undefined, column: string): number | undefined {
  if (isBlankAmount(value)) return undefined;
  const parsed = tryParseAmount(value);
  if (parsed === undefined) {
    throw new RowRejected('invalid-amount', `Non-numeric ${column} "${String(value)}"`);
  }
  return roundToTwoDecimals(parsed);
}

function within(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance;
}

/**
 * Lazily normalize rows, one outcome per transaction kept and one per
 * diagnostic. Restarting the iteration of `rows` restarts normalization.
 */
export function* normalizeRows(rows: Iterable<RawRow>, context: NormalizeContext): Generator<NormalizeOutcome> {
  const formats = [...context.dateFormats, ...FALLBACK_DATE_FORMATS];
  const tolerance = context.balanceTolerance ?? DEFAULT_BALANCE_TOLERANCE;
  let previousBalance: number | undefined;
  let index = -1;

  for (const row of rows) {
    index++;

    // A balance that is not a number is ignored, it is not part of the transaction
    const balance = isBlankAmount(row.balance) ? undefined : tryParseAmount(row.balance);
    const priorBalance = previousBalance;
    if (balance !== undefined) previousBalance = balance;

    const date = tryParseDate(row.date, formats);
    if (date === undefined) {
      yield diagnostic(index, row, 'dropped', 'invalid-date', `Unparseable date "${row.date}"`);
      continue;
    }

    let withdrawal: number | undefined;
    let deposit: number | undefined;
    let unsigned: number | undefined;
    let signed: number | undefined;
    try {
      withdrawal = amountOf(row.withdrawal, 'withdrawal');
      deposit = amountOf(row.deposit, 'deposit');
      signed = amountOf(row.amount, 'amount');
      unsigned = amountOf(row.unsignedAmount, 'amount');
    } catch (error) {
      if (!(error instanceof RowRejected)) throw error;
      yield diagnostic(index, row, 'dropped', error.reason, error.message);
      continue;
    }

    if (withdrawal === undefined && deposit === undefined && signed !== undefined) {
      if (signed < 0) withdrawal = -signed;
      else deposit = signed;
    }

    if (withdrawal === undefined && deposit === undefined && unsigned !== undefined && unsigned !== 0) {
      yield diagnostic(
        index,
        row,
        'dropped',
        'unresolved-polarity',
        `Amount ${unsigned} has no debit/credit indicator the layout can resolve`
      );
      continue;
    }

    const repairs: NormalizeOutcome[] = [];
    if (withdrawal !== undefined && withdrawal < 0) {
      repairs.push(diagnostic(index, row, 'repaired', 'negative-amount', `Negative withdrawal ${withdrawal} taken as ${-withdrawal}`));
      withdrawal = -withdrawal;
    }
    if (deposit !== undefined && deposit < 0) {
      repairs.push(diagnostic(index, row, 'repaired', 'negative-amount', `Negative deposit ${deposit} taken as ${-deposit}`));
      deposit = -deposit;
    }

    const out = withdrawal ?? 0;
    const inn = deposit ?? 0;

    if (out === 0 && inn === 0) {
      yield diagnostic(index, row, 'dropped', 'missing-amount', 'Row has no withdrawal or deposit amount');
      continue;
    }

    if (out !== 0 && inn !== 0) {
      if (priorBalance !== undefined && balance !== undefined && within(priorBalance - out, balance, tolerance)) {
        repairs.push(diagnostic(index, row, 'repaired', 'balance-disambiguated', `Running balance shows a withdrawal of ${out}; deposit ${inn} ignored`));
        deposit = undefined;
      } else if (priorBalance !== undefined && balance !== undefined && within(priorBalance + inn, balance, tolerance)) {
        repairs.push(diagnostic(index, row, 'repaired', 'balance-disambiguated', `Running balance shows a deposit of ${inn}; withdrawal ${out} ignored`));
        withdrawal = undefined;
      } else {
        yield diagnostic(index, row, 'dropped', 'conflicting-amounts', `Both withdrawal ${out} and deposit ${inn} are present`);
        continue;
      }
    } else if (out === 0) {
      withdrawal = undefined;
    } else {
      deposit = undefined;
    }

    const parsed = TransactionSchema.safeParse({
      date,
      ...(withdrawal === undefined ? {} : { withdrawal }),
      ...(deposit === undefined ? {} : { deposit }),
      payee: collapse(row.payee),
      description: collapse(row.description),
      referenceNumber: collapse(row.reference),
    });
    if (!parsed.success) {
      throw new Error(`Normalized row ${index} violates the transaction schema: ${parsed.error.message}`);
    }

    yield* repairs;
    yield { kind: 'transaction', row: index, transaction: parsed.data, balance: balance ?? null };
  }
}

/**
 * Materialize a row sequence into an ExtractionResult. Reconciliation is
 * left to the caller.
 */
export function normalize(rows: Iterable<RawRow>, context: NormalizeContext): ExtractionResult {
  const transactions: Transaction[] = [];
  const balances: Array<number | null> = [];
  const diagnostics: Diagnostic[] = [];
  const repairedRows = new Set<number>();
  let rowsDropped = 0;
  let lastRow = -1;

  for (const outcome of normalizeRows(rows, context)) {
    if (outcome.kind === 'transaction') {
      transactions.push(outcome.transaction);
      balances.push(outcome.balance);
      lastRow = Math.max(lastRow, outcome.row);
      continue;
    }
    const { diagnostic: entry } = outcome;
    diagnostics.push(entry);
    lastRow = Math.max(lastRow, entry.row);
    if (entry.action === 'dropped') rowsDropped++;
    else repairedRows.add(entry.row);
  }

  return {
    bankId: context.bankId,
    extractor: context.extractor,
    transactions,
    balances,
    diagnostics,
    warnings: [...(context.warnings ?? [])],
    reconciliation: null,
    stats: {
      pages: context.pages,
      rowsSeen: lastRow + 1,
      rowsKept: transactions.length,
      rowsDropped,
      rowsRepaired: repairedRows.size,
    },
    fallback: context.fallback ?? false,
    parserVersion: PARSER_VERSION,
  };
}

/** Dropped-row counts per reason, for summaries. */
export function countDropped(diagnostics: readonly Diagnostic[]): Partial<Record<DiagnosticReason, number>> {
  const counts: Partial<Record<DiagnosticReason, number>> = {};
  for (const entry of diagnostics) {
    if (entry.action !== 'dropped') continue;
    counts[entry.reason] = (counts[entry.reason] ?? 0) + 1;
  }
  return counts;
}
