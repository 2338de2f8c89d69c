/**
 * Dispatcher
 *
 * bank id -> profile -> Loader -> Extractor -> Normalizer -> reconciliation,
 * in that fixed order. Document-level errors abort the conversion; they are
 * never retried here and never come with partial rows.
 */
import type { DocumentKind, ExtractionResult, RawDocument } from '@statement-kit/types';
import {
  FormatMismatchError,
  UnreadableDocumentError,
  getConfig,
  isStatementError,
  logger,
} from '@statement-kit/types';
import { load, sniffFileKind, type FileKind } from '@statement-kit/document-loader';
import type { Extractor } from '@statement-kit/extractors';
import { normalize } from './normalizer.js';
import { describeReconciliation, reconcileRunningBalance } from './reconcile.js';
import { getBankProfile, listBanks, type BankProfile } from './registry.js';

export interface ConvertOptions {
  maxPages?: number;
  /** For "other": try catalogued layouts before the universal extractor */
  autoDetect?: boolean;
  balanceTolerance?: number;
  minReconciledRows?: number;
}

interface ResolvedOptions {
  autoDetect: boolean;
  balanceTolerance: number;
  minReconciledRows: number;
}

const NO_DATED_LINES =
  'No dated transaction lines were found; the document may be scanned or use an unsupported layout';

function resolveOptions(options: ConvertOptions): ResolvedOptions {
  const config = getConfig();
  return {
    autoDetect: options.autoDetect ?? config.autoDetect,
    balanceTolerance: options.balanceTolerance ?? config.balanceTolerance,
    minReconciledRows: options.minReconciledRows ?? config.minReconciledRows,
  };
}

function documentKindOf(kind: FileKind): DocumentKind | undefined {
  switch (kind) {
    case 'pdf':
      return 'pdf';
    case 'xlsx':
    case 'ole':
    case 'csv':
      return 'spreadsheet';
    case 'unknown':
      return undefined;
  }
}

function assertKind(profile: BankProfile, kind: DocumentKind): void {
  if (profile.documentKinds.includes(kind)) return;
  const hint =
    kind === 'spreadsheet'
      ? 'Choose "excel" for spreadsheet exports, or "other"'
      : `${profile.displayName} expects a ${profile.documentKinds.join(' or ')} file`;
  throw new UnreadableDocumentError(`${profile.displayName} does not accept ${kind} documents`, hint);
}

/**
 * Convert a statement file for the selected bank.
 *
 * @throws UnknownBankError, AuthenticationError, UnreadableDocumentError, FormatMismatchError
 */
export async function convert(
  bankId: string,
  file: Uint8Array,
  password?: string,
  options: ConvertOptions = {}
): Promise<ExtractionResult> {
  logger.info('Conversion started', { bankId, bytes: file.length, password: password !== undefined });

  try {
    const profile = getBankProfile(bankId);
    const kind = documentKindOf(sniffFileKind(file));
    if (kind !== undefined) assertKind(profile, kind);

    const doc = await load(file, password, { maxPages: options.maxPages });
    return run(profile, doc, resolveOptions(options));
  } catch (error) {
    if (isStatementError(error)) {
      logger.warn('Conversion failed', { bankId, kind: error.kind, message: error.message });
    }
    throw error;
  }
}

/**
 * Same pipeline for a document that is already loaded.
 */
export function convertDocument(bankId: string, doc: RawDocument, options: ConvertOptions = {}): ExtractionResult {
  const profile = getBankProfile(bankId);
  assertKind(profile, doc.kind);
  return run(profile, doc, resolveOptions(options));
}

function run(profile: BankProfile, doc: RawDocument, options: ResolvedOptions): ExtractionResult {
  const result = profile.autoDetect
    ? detectAndExtract(profile, doc, options)
    : extractWith(profile, profile.createExtractor(), doc, options, false);

  logger.info('Conversion finished', {
    bankId: profile.id,
    extractor: result.extractor,
    fallback: result.fallback,
    kept: result.stats.rowsKept,
    dropped: result.stats.rowsDropped,
  });
  return result;
}

function extractWith(
  profile: BankProfile,
  extractor: Extractor,
  doc: RawDocument,
  options: ResolvedOptions,
  fallback: boolean
): ExtractionResult {
  const rows = extractor.extract(doc);
  const result = normalize(rows, {
    bankId: profile.id,
    extractor: extractor.id,
    dateFormats: profile.dateFormats,
    pages: doc.pages.length,
    fallback,
    warnings: doc.warnings,
    balanceTolerance: options.balanceTolerance,
  });

  const reconciliation = reconcileRunningBalance(result.transactions, result.balances, {
    tolerance: options.balanceTolerance,
    minConsecutive: options.minReconciledRows,
  });
  result.reconciliation = reconciliation;
  if (reconciliation.applicable && !reconciliation.passed) {
    result.warnings.push(describeReconciliation(reconciliation, options.minReconciledRows));
  }
  return result;
}

/**
 * "other": known layouts first, in catalog order, then the universal
 * extractor.
 */
function detectAndExtract(profile: BankProfile, doc: RawDocument, options: ResolvedOptions): ExtractionResult {
  if (options.autoDetect) {
    for (const candidate of listBanks()) {
      if (candidate.autoDetect || !candidate.documentKinds.includes(doc.kind)) continue;

      const extractor = candidate.createExtractor();
      if (!extractor.detect(doc)) continue;

      try {
        const result = extractWith(candidate, extractor, doc, options, false);
        if (result.transactions.length > 0) {
          logger.info('Layout detected', { bankId: profile.id, detected: candidate.id });
          return { ...result, bankId: profile.id };
        }
        logger.debug('Detected layout produced no transactions', { detected: candidate.id });
      } catch (error) {
        if (!(error instanceof FormatMismatchError)) throw error;
        logger.debug('Detected layout did not match', { detected: candidate.id });
      }
    }
  }

  logger.warn('Falling back to the universal extractor', { bankId: profile.id, pages: doc.pages.length });
  const result = extractWith(profile, profile.createExtractor(), doc, options, true);
  if (result.stats.rowsSeen === 0) {
    result.warnings.push(NO_DATED_LINES);
  }
  return result;
}
