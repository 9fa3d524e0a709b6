/**
 * Bundled branch-code table.
 *
 * One authoritative code → institution map. Where historical tables
 * disagreed on a code, the JSON holds the single chosen name.
 */

import rawCodes from './bank-codes.json' with { type: 'json' };
import { BankCodeTableSchema } from '../types/index.js';
import type { BankCodeEntry, BankCodeTable } from '../types/index.js';

export const BANK_CODES: Readonly<BankCodeTable> = Object.freeze(BankCodeTableSchema.parse(rawCodes));

/**
 * @returns Table entry for a 5-digit branch code, or null if unlisted
 */
export function lookupBankCode(code: string, table: Readonly<BankCodeTable> = BANK_CODES): BankCodeEntry | null {
    return Object.hasOwn(table, code) ? table[code] : null;
}
