import { readdir, stat } from 'fs/promises';
import { join, extname, normalize } from 'path';

/** Extensions a statement export can have. */
export const STATEMENT_EXTENSIONS: readonly string[] = ['.pdf', '.xlsx', '.xls', '.csv'];

export interface StatementFileInfo {
  filePath: string;
  fileName: string;
  sizeBytes: number;
}

export interface ScanResult {
  files: StatementFileInfo[];
  skipped: Array<{ fileName: string; reason: string }>;
  directoryPath: string;
}

/**
 * Scans a directory for statement files, filtering out temporary/empty files.
 * Returns files sorted by filename ascending for deterministic processing.
 */
export async function scanDirectoryForStatements(directoryPath: string): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });

  const files: StatementFileInfo[] = [];
  const skipped: Array<{ fileName: string; reason: string }> = [];

  for (const entry of entries) {
    if (entry.isDirectory()) continue;

    const fileName = entry.name;
    const filePath = join(normalizedPath, fileName);

    if (!STATEMENT_EXTENSIONS.includes(extname(fileName).toLowerCase())) continue;

    // Office lock files and hidden files
    if (fileName.startsWith('~$') || fileName.startsWith('.')) {
      skipped.push({ fileName, reason: 'Temporary file (starts with ~$ or .)' });
      continue;
    }

    const fileStat = await stat(filePath);
    if (fileStat.size === 0) {
      skipped.push({ fileName, reason: 'Zero-byte file' });
      continue;
    }

    files.push({ filePath, fileName, sizeBytes: fileStat.size });
  }

  files.sort((a, b) => a.fileName.localeCompare(b.fileName));

  return { files, skipped, directoryPath: normalizedPath };
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Validates that a directory exists and is accessible.
 */
export async function validateDirectory(directoryPath: string): Promise<{ valid: boolean; error?: string }> {
  try {
    const normalizedPath = normalize(directoryPath);
    const dirStat = await stat(normalizedPath);

    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${normalizedPath}` };
    }
    return { valid: true };
  } catch (error) {
    switch (errorCode(error)) {
      case 'ENOENT':
        return { valid: false, error: `Directory does not exist: ${directoryPath}` };
      case 'EACCES':
        return { valid: false, error: `Permission denied: ${directoryPath}` };
      default:
        return { valid: false, error: `Cannot access directory: ${directoryPath}` };
    }
  }
}
