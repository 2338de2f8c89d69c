/**
 * Document-level failures. Each aborts a conversion and carries a hint the
 * caller can show to the user. Row-level problems are diagnostics instead.
 */

export type StatementErrorKind =
  | 'unknown-bank'
  | 'authentication'
  | 'unreadable-document'
  | 'format-mismatch';

export abstract class StatementError extends Error {
  abstract readonly kind: StatementErrorKind;
  readonly hint: string | undefined;

  protected constructor(message: string, hint?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.hint = hint;
  }
}

export class UnknownBankError extends StatementError {
  readonly kind = 'unknown-bank';
  readonly bankId: string;

  constructor(bankId: string, knownIds: readonly string[] = []) {
    super(
      `Unknown bank: ${bankId}`,
      knownIds.length > 0 ? `Choose one of: ${knownIds.join(', ')}` : undefined
    );
    this.bankId = bankId;
  }
}

export type AuthenticationFailure = 'missing' | 'incorrect';

export class AuthenticationError extends StatementError {
  readonly kind = 'authentication';
  readonly reason: AuthenticationFailure;

  constructor(reason: AuthenticationFailure, options?: { cause?: unknown }) {
    super(
      reason === 'missing'
        ? 'Document is password-protected'
        : 'Incorrect password for this document',
      reason === 'missing'
        ? 'Supply the statement password and try again'
        : 'Check the password (it is usually case-sensitive) and try again',
      options
    );
    this.reason = reason;
  }
}

export class UnreadableDocumentError extends StatementError {
  readonly kind = 'unreadable-document';

  constructor(message: string, hint?: string, options?: { cause?: unknown }) {
    super(message, hint ?? 'Upload the original PDF or spreadsheet export from the bank', options);
  }
}

export class FormatMismatchError extends StatementError {
  readonly kind = 'format-mismatch';
  readonly bankId: string;

  constructor(bankId: string, message: string) {
    super(message, 'Check the selected bank, or choose "other" to use the generic parser');
    this.bankId = bankId;
  }
}

export function isStatementError(value: unknown): value is StatementError {
  return value instanceof StatementError;
}
