/**
 * Bank module: IBAN classification against the bundled branch-code table.
 */

export { classify, classifyIban, cleanIban } from './classify.js';
export { BANK_CODES, lookupBankCode } from './codes.js';
export { summarizeBanks } from './stats.js';
