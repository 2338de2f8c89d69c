/**
 * Content sniffing. The file name is only a hint; bytes decide.
 */
export type FileKind = 'pdf' | 'xlsx' | 'ole' | 'csv' | 'unknown';

const PDF_MAGIC = '%PDF';
/** Some generators put junk before the header; readers accept it within 1 KiB */
const PDF_SEARCH_WINDOW = 1024;
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];
const OLE_MAGIC = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

function startsWith(bytes: Uint8Array, magic: number[]): boolean {
  if (bytes.length < magic.length) return false;
  return magic.every((byte, index) => bytes[index] === byte);
}

function hasPdfHeader(bytes: Uint8Array): boolean {
  const head = Buffer.from(bytes.subarray(0, PDF_SEARCH_WINDOW)).toString('latin1');
  return head.includes(PDF_MAGIC);
}

function looksLikeText(bytes: Uint8Array): boolean {
  const sample = bytes.subarray(0, 4096);
  if (sample.length === 0) return false;
  return !sample.includes(0);
}

/**
 * Classify a file by its leading bytes.
 *
 * `ole` covers legacy .xls workbooks and password-protected .xlsx files,
 * which are wrapped in an OLE container.
 */
export function sniffFileKind(bytes: Uint8Array): FileKind {
  if (hasPdfHeader(bytes)) return 'pdf';
  if (startsWith(bytes, ZIP_MAGIC)) return 'xlsx';
  if (startsWith(bytes, OLE_MAGIC)) return 'ole';
  if (looksLikeText(bytes)) return 'csv';
  return 'unknown';
}

/** Directory entry name of the stream an encrypted OOXML package carries. */
const ENCRYPTION_INFO = Buffer.from('EncryptionInfo', 'utf16le');

/**
 * Password-protected .xlsx files are not zip packages but OLE containers
 * holding an `EncryptionInfo` stream next to the encrypted package.
 */
export function isEncryptedWorkbook(bytes: Uint8Array): boolean {
  if (!startsWith(bytes, OLE_MAGIC)) return false;
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).includes(ENCRYPTION_INFO);
}
