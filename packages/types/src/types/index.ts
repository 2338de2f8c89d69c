export { BANK_IDS, isBankId } from './bank.js';
export type { BankId, ExtractorId, DocumentKind, ExtractionStrategy } from './bank.js';
export type { TextItem, RawPage, RawDocument, RawDocumentMetadata } from './document.js';
export type { RawRow, RawValue } from './raw-row.js';
export type { ExportDocument, ExportTransaction, ExportDiagnostic } from './export.js';
