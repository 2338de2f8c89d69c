export { convert, convertDocument, type ConvertOptions } from './dispatcher.js';
export { BANK_PROFILES, getBankProfile, listBanks, type BankProfile } from './registry.js';
export { normalize, normalizeRows, countDropped, type NormalizeContext, type NormalizeOutcome } from './normalizer.js';
export { reconcileRunningBalance, describeReconciliation, type ReconcileOptions } from './reconcile.js';
export { isBankId } from '@statement-kit/types';
