import type { RawDocument, RawRow } from '@statement-kit/types';
import { parseAmount, tryParseAmount } from '@statement-kit/types';
import { TextExtractor, type TextBlock } from '../text-extractor.js';
import { balanceCell, findAmountTokens, stripAmountTokens } from '../helpers/amounts.js';
import { balanceTrendPolarity, keywordPolarity, type KeywordRules } from '../helpers/polarity.js';
import { collapseWhitespace } from '../helpers/text.js';

const ENBD_V2_PATTERNS = {
  rowStart: /^\d{2}[A-Z]{3}\d{2}\b/,
  broughtForward: /brought\s+forward/i,
  breakLine: /carried\s+forward|brought\s+forward|^date\s+description\b/i,
};

const ENBD_KEYWORDS: KeywordRules = {
  deposit: ['REFUND', 'CUSTOMER CREDIT', 'TRANSFER', 'CREDIT', 'POS-REFUNDS', 'SETT', 'REMIT'],
  withdrawal: ['POS-PURCHASE', 'PURCHASE', 'INWARD', 'CHQ', 'DEBIT', 'CLEARING', 'FEE', 'CHARGES', 'VALUE ADDED TAX'],
};

interface RunningBalance {
  previous: number | undefined;
}

function toBalance(raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : tryParseAmount(balanceCell(raw));
}

/**
 * Dates like `02NOV25`, description lines, then an `amount balanceCr` line.
 * The amount has no column of its own: description keywords decide, then the
 * running balance; otherwise the row stays unsigned.
 */
export class EmiratesNbdV2Extractor extends TextExtractor<RunningBalance> {
  readonly id = 'emirates-nbd-v2';
  protected readonly signature = /emirates\s*nbd/i;
  protected readonly rowStart = ENBD_V2_PATTERNS.rowStart;
  protected override readonly breakLines = [ENBD_V2_PATTERNS.breakLine];

  protected createState(_doc: RawDocument): RunningBalance {
    return { previous: undefined };
  }

  protected override onPreambleLine(line: string, state: RunningBalance): void {
    if (!ENBD_V2_PATTERNS.broughtForward.test(line)) return;
    const tokens = findAmountTokens(line);
    const last = tokens[tokens.length - 1];
    if (last === undefined) return;
    state.previous = toBalance(last.indicator === undefined ? last.raw : `${last.raw} ${last.indicator}`);
  }

  protected parseBlock(block: TextBlock, state: RunningBalance): RawRow {
    const [first = '', ...rest] = block.lines;
    const date = first.split(' ')[0] ?? '';
    const descriptionParts: string[] = [];

    let amount: string | undefined;
    let balanceRaw: string | undefined;

    for (const line of [first.slice(date.length), ...rest]) {
      const tokens = findAmountTokens(line);
      const [amountToken, balanceToken] = tokens;
      if (amountToken === undefined) {
        descriptionParts.push(line);
        continue;
      }
      // First amount line closes the row; anything after it is page noise
      amount = amountToken.magnitude;
      if (balanceToken !== undefined) {
        balanceRaw = balanceToken.indicator === undefined ? balanceToken.raw : `${balanceToken.raw} ${balanceToken.indicator}`;
      }
      descriptionParts.push(stripAmountTokens(line, tokens));
      break;
    }

    const description = collapseWhitespace(descriptionParts.join(' '));
    const balance = toBalance(balanceRaw);
    const row: RawRow = {
      page: block.page,
      date,
      description,
      balance: balanceRaw === undefined ? undefined : balanceCell(balanceRaw),
      source: block.lines.join('\n'),
    };

    if (amount !== undefined) {
      const polarity =
        keywordPolarity(description, ENBD_KEYWORDS) ??
        balanceTrendPolarity(state.previous, balance, parseAmount(amount));
      if (polarity === 'deposit') row.deposit = amount;
      else if (polarity === 'withdrawal') row.withdrawal = amount;
      else row.unsignedAmount = amount;
    }

    if (balance !== undefined) state.previous = balance;
    return row;
  }
}
