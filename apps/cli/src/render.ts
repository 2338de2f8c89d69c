/**
 * Rendering of results and failures for the terminal and for output files.
 */
import type { ExtractionResult } from '@statement-kit/types';
import { isStatementError, type DisplayDateFormat } from '@statement-kit/types';
import { countDropped } from '@statement-kit/converter';
import { exportCsv, exportJson, exportWorkbook } from '@statement-kit/output';

export const OUTPUT_FORMATS = ['csv', 'xlsx', 'json'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function isDisplayDateFormat(value: string): value is DisplayDateFormat {
  return value === 'dmy' || value === 'iso';
}

export function renderResult(
  result: ExtractionResult,
  format: OutputFormat,
  options: { dateFormat: DisplayDateFormat; fileName?: string }
): string | Buffer {
  switch (format) {
    case 'csv':
      return `${exportCsv(result, { dateFormat: options.dateFormat })}\n`;
    case 'xlsx':
      return exportWorkbook(result, { dateFormat: options.dateFormat });
    case 'json':
      return `${exportJson(result, { fileName: options.fileName })}\n`;
  }
}

/**
 * `[INFO]` lines describing a successful conversion.
 */
export function summarizeResult(result: ExtractionResult, label: string): string[] {
  const lines = [`[INFO] ${label}: ${result.transactions.length} transaction(s) via ${result.extractor}`];
  if (result.fallback) {
    lines.push('[INFO] No known layout matched; the generic parser was used');
  }

  const dropped = Object.entries(countDropped(result.diagnostics));
  if (dropped.length > 0) {
    const reasons = dropped.map(([reason, count]) => `${reason} ${count}`).join(', ');
    lines.push(`[INFO] Dropped ${result.stats.rowsDropped} row(s): ${reasons}`);
  }
  for (const warning of result.warnings) {
    lines.push(`[WARN] ${warning}`);
  }
  return lines;
}

/**
 * `[ERROR]` lines for a failed conversion: kind and hint for typed
 * failures, the message otherwise.
 */
export function describeFailure(error: unknown): string[] {
  if (isStatementError(error)) {
    const lines = [`[ERROR] ${error.kind}: ${error.message}`];
    if (error.hint !== undefined) lines.push(`[ERROR] ${error.hint}`);
    return lines;
  }
  const message = error instanceof Error ? error.message : String(error);
  return [`[ERROR] ${message}`];
}
