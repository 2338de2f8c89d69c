export type { Extractor } from './types.js';
export { BaseExtractor } from './base-extractor.js';
export {
  TableExtractor,
  cellAt,
  mapColumns,
  type AmountLayout,
  type ColumnMap,
  type TableAnchor,
} from './table-extractor.js';
export { TextExtractor, DEFAULT_NOISE, type TextAnchor, type TextBlock } from './text-extractor.js';
export { UniversalExtractor, leadingDate } from './universal.js';
export { restartable } from './restartable.js';
export * from './banks/index.js';
export * from './helpers/index.js';
