/**
 * IBAN bank classification.
 *
 * Only French IBANs are classified. The branch code (characters 5-9) is
 * looked up in the bundled table; everything else resolves to a fixed label.
 * No checksum validation and no network lookups.
 *
 * ARCHITECTURAL NOTE: Never throws. Every input yields a label.
 */

import {
    BANK_LABEL,
    IBAN_LAYOUT,
    frenchBankLabel,
} from '../types/index.js';
import type { BankClassification, BankCodeTable } from '../types/index.js';
import { BANK_CODES, lookupBankCode } from './codes.js';

/**
 * Canonicalize an IBAN: drop spaces and hyphens, uppercase.
 */
export function cleanIban(raw: string): string {
    if (!raw) return '';
    return raw.replace(/[\s-]/g, '').toUpperCase();
}

/**
 * Classify an IBAN into a bank label with its kind and branch code.
 *
 * Order of checks:
 * 1. Empty after cleaning → invalid
 * 2. Not FR → foreign
 * 3. Shorter than 14 → invalid
 * 4. Branch code listed → table name, otherwise "French bank (code)"
 */
export function classifyIban(
    raw: string,
    table: Readonly<BankCodeTable> = BANK_CODES
): BankClassification {
    const iban = cleanIban(raw);

    if (!iban) {
        return { label: BANK_LABEL.INVALID, kind: 'invalid', code: null };
    }
    if (!iban.startsWith(IBAN_LAYOUT.COUNTRY_PREFIX)) {
        return { label: BANK_LABEL.FOREIGN, kind: 'foreign', code: null };
    }
    if (iban.length < IBAN_LAYOUT.MIN_LENGTH) {
        return { label: BANK_LABEL.INVALID, kind: 'invalid', code: null };
    }

    const code = iban.slice(IBAN_LAYOUT.BRANCH_CODE_START, IBAN_LAYOUT.BRANCH_CODE_END);
    const entry = lookupBankCode(code, table);

    if (!entry) {
        return { label: frenchBankLabel(code), kind: 'unlisted', code };
    }

    return {
        label: entry.name,
        kind: entry.network === 'credit-agricole' ? 'credit-agricole' : 'other-listed',
        code,
    };
}

/**
 * Bank label for an IBAN.
 */
export function classify(raw: string, table: Readonly<BankCodeTable> = BANK_CODES): string {
    return classifyIban(raw, table).label;
}
