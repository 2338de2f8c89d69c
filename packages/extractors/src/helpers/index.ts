export {
  findAmountTokens,
  signedValue,
  stripIndicator,
  balanceCell,
  stripAmountTokens,
  toIndicator,
  type AmountToken,
  type Indicator,
} from './amounts.js';
export { collapseWhitespace, documentText, extractReference, stripReferenceLabel } from './text.js';
export {
  balanceTrendPolarity,
  keywordPolarity,
  GENERIC_KEYWORDS,
  type Polarity,
  type KeywordRules,
} from './polarity.js';
