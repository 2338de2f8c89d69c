/**
 * Bank catalog. One frozen profile per BankId binds the statement layout to
 * its extractor and the date formats it prints. Adding a bank means adding
 * a profile here and an extractor class; the dispatcher does not change.
 */
import type { BankId, DateFormat, DocumentKind, ExtractionStrategy } from '@statement-kit/types';
import { ALL_DATE_FORMATS, BANK_IDS, UnknownBankError, isBankId } from '@statement-kit/types';
import {
  AdcbAccountExtractor,
  AdcbCreditCardExtractor,
  AdcbExtractor,
  AdcbV2Extractor,
  BankOfBarodaExtractor,
  BanqueMisrExtractor,
  DibExtractor,
  EmiratesIslamicExtractor,
  EmiratesNbdExtractor,
  EmiratesNbdV2Extractor,
  MashreqExtractor,
  MashreqV2Extractor,
  PlutoExtractor,
  RakbankCreditCardExtractor,
  RakbankExtractor,
  SpreadsheetExtractor,
  UabExtractor,
  UniversalExtractor,
  WioExtractor,
  type Extractor,
} from '@statement-kit/extractors';

export interface BankProfile {
  readonly id: BankId;
  readonly displayName: string;
  readonly documentKinds: readonly DocumentKind[];
  readonly passwordSupport: boolean;
  readonly strategy: ExtractionStrategy;
  /** Tried in order before the generic fallbacks */
  readonly dateFormats: readonly DateFormat[];
  /** Whether known layouts are tried before the extractor */
  readonly autoDetect: boolean;
  createExtractor(): Extractor;
}

const PDF: readonly DocumentKind[] = ['pdf'];
const SPREADSHEET: readonly DocumentKind[] = ['spreadsheet'];
const ANY: readonly DocumentKind[] = ['pdf', 'spreadsheet'];

function profile(definition: BankProfile): BankProfile {
  return Object.freeze({
    ...definition,
    documentKinds: Object.freeze([...definition.documentKinds]),
    dateFormats: Object.freeze([...definition.dateFormats]),
  });
}

export const BANK_PROFILES = Object.freeze({
  'emirates-nbd': profile({
    id: 'emirates-nbd',
    displayName: 'Emirates NBD',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'table',
    dateFormats: ['DD-MM-YYYY', 'DD/MM/YYYY', 'DD MMM YYYY'],
    autoDetect: false,
    createExtractor: () => new EmiratesNbdExtractor(),
  }),
  'emirates-nbd-v2': profile({
    id: 'emirates-nbd-v2',
    displayName: 'Emirates NBD (2025 layout)',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'text',
    dateFormats: ['DDMMMYY'],
    autoDetect: false,
    createExtractor: () => new EmiratesNbdV2Extractor(),
  }),
  'emirates-islamic': profile({
    id: 'emirates-islamic',
    displayName: 'Emirates Islamic',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'table',
    dateFormats: ['DD/MM/YYYY', 'DD-MM-YYYY', 'DD-MMM-YYYY'],
    autoDetect: false,
    createExtractor: () => new EmiratesIslamicExtractor(),
  }),
  wio: profile({
    id: 'wio',
    displayName: 'Wio Bank',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'text',
    dateFormats: ['DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new WioExtractor(),
  }),
  rakbank: profile({
    id: 'rakbank',
    displayName: 'RAKBANK',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'table',
    dateFormats: ['DD-MMM-YYYY', 'DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new RakbankExtractor(),
  }),
  'rakbank-credit-card': profile({
    id: 'rakbank-credit-card',
    displayName: 'RAKBANK Credit Card',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'text',
    dateFormats: ['DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new RakbankCreditCardExtractor(),
  }),
  dib: profile({
    id: 'dib',
    displayName: 'Dubai Islamic Bank',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'table',
    dateFormats: ['DD MMM YYYY', 'DD-MMM-YYYY', 'DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new DibExtractor(),
  }),
  'banque-misr': profile({
    id: 'banque-misr',
    displayName: 'Banque Misr',
    documentKinds: PDF,
    passwordSupport: false,
    strategy: 'table',
    dateFormats: ['DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new BanqueMisrExtractor(),
  }),
  adcb: profile({
    id: 'adcb',
    displayName: 'ADCB',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'text',
    dateFormats: ['DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new AdcbExtractor(),
  }),
  'adcb-v2': profile({
    id: 'adcb-v2',
    displayName: 'ADCB (table layout)',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'table',
    dateFormats: ['DD-MMM-YYYY', 'DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new AdcbV2Extractor(),
  }),
  'adcb-credit-card': profile({
    id: 'adcb-credit-card',
    displayName: 'ADCB Credit Card',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'text',
    dateFormats: ['DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new AdcbCreditCardExtractor(),
  }),
  'adcb-account': profile({
    id: 'adcb-account',
    displayName: 'ADCB Account',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'text',
    dateFormats: ['DD-MMM-YYYY'],
    autoDetect: false,
    createExtractor: () => new AdcbAccountExtractor(),
  }),
  mashreq: profile({
    id: 'mashreq',
    displayName: 'Mashreq',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'table',
    dateFormats: ['DD/MM/YYYY', 'DD-MM-YYYY', 'DD MMM YYYY'],
    autoDetect: false,
    createExtractor: () => new MashreqExtractor(),
  }),
  'mashreq-v2': profile({
    id: 'mashreq-v2',
    displayName: 'Mashreq (2024 layout)',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'table',
    dateFormats: ['YYYY-MM-DD'],
    autoDetect: false,
    createExtractor: () => new MashreqV2Extractor(),
  }),
  uab: profile({
    id: 'uab',
    displayName: 'United Arab Bank',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'table',
    dateFormats: ['DD.MM.YYYY', 'DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new UabExtractor(),
  }),
  pluto: profile({
    id: 'pluto',
    displayName: 'Pluto',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'text',
    dateFormats: ['DD/MM/YYYY'],
    autoDetect: false,
    createExtractor: () => new PlutoExtractor(),
  }),
  'bank-of-baroda': profile({
    id: 'bank-of-baroda',
    displayName: 'Bank of Baroda',
    documentKinds: PDF,
    passwordSupport: true,
    strategy: 'table',
    dateFormats: ['DD/MM/YYYY', 'DD-MM-YYYY'],
    autoDetect: false,
    createExtractor: () => new BankOfBarodaExtractor(),
  }),
  excel: profile({
    id: 'excel',
    displayName: 'Excel / CSV export',
    documentKinds: SPREADSHEET,
    passwordSupport: true,
    strategy: 'spreadsheet',
    dateFormats: ['YYYY-MM-DD', 'DD/MM/YYYY', 'DD-MM-YYYY', 'DD-MMM-YYYY', 'DD MMM YYYY', 'DD.MM.YYYY', 'DD/MM/YY'],
    autoDetect: false,
    createExtractor: () => new SpreadsheetExtractor(),
  }),
  other: profile({
    id: 'other',
    displayName: 'Other banks',
    documentKinds: ANY,
    passwordSupport: true,
    strategy: 'heuristic',
    // Whatever the universal extractor recognises as a leading date
    dateFormats: ALL_DATE_FORMATS,
    autoDetect: true,
    createExtractor: () => new UniversalExtractor(),
  }),
} satisfies Record<BankId, BankProfile>);

/**
 * Profile for a bank id; throws UnknownBankError for anything outside the
 * catalog.
 */
export function getBankProfile(bankId: string): BankProfile {
  if (!isBankId(bankId)) {
    throw new UnknownBankError(bankId, BANK_IDS);
  }
  return BANK_PROFILES[bankId];
}

/** All profiles in catalog order, for a bank picker. */
export function listBanks(): BankProfile[] {
  return BANK_IDS.map((id) => BANK_PROFILES[id]);
}
