export { EmiratesNbdExtractor } from './emirates-nbd.js';
export { EmiratesNbdV2Extractor } from './emirates-nbd-v2.js';
export { EmiratesIslamicExtractor } from './emirates-islamic.js';
export { WioExtractor } from './wio.js';
export { RakbankExtractor } from './rakbank.js';
export { RakbankCreditCardExtractor } from './rakbank-credit-card.js';
export { DibExtractor } from './dib.js';
export { BanqueMisrExtractor } from './banque-misr.js';
export { AdcbExtractor } from './adcb.js';
export { AdcbV2Extractor } from './adcb-v2.js';
export { AdcbCreditCardExtractor } from './adcb-credit-card.js';
export { AdcbAccountExtractor } from './adcb-account.js';
export { MashreqExtractor } from './mashreq.js';
export { MashreqV2Extractor } from './mashreq-v2.js';
export { UabExtractor } from './uab.js';
export { PlutoExtractor } from './pluto.js';
export { BankOfBarodaExtractor } from './bank-of-baroda.js';
export { SpreadsheetExtractor } from './excel.js';
