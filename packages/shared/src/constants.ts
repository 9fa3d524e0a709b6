/**
 * Constants for the caller directory.
 * Labels, placeholders and the fixed layout of the pipe-delimited export.
 */

/**
 * Placeholder for fields the export never supplies
 * (gender, birthplace, profession, company) and for an empty IBAN.
 */
export const PLACEHOLDER = 'N/A';

/**
 * Client status values.
 * Prospect: sourced from an ingested export.
 * Unknown: synthesized on a lookup miss, never stored.
 */
export const CLIENT_STATUS = {
    PROSPECT: 'Prospect',
    UNKNOWN: 'Unknown',
} as const;

/**
 * Identity used for synthesized Unknown records.
 */
export const UNKNOWN_CLIENT = {
    LAST_NAME: 'UNKNOWN',
    FIRST_NAME: 'CALLER',
} as const;

/**
 * Fixed bank labels. Unlisted French codes use `frenchBankLabel`.
 */
export const BANK_LABEL = {
    FOREIGN: 'Foreign bank',
    INVALID: 'Invalid IBAN',
    NONE: PLACEHOLDER,
} as const;

export function frenchBankLabel(code: string): string {
    return `French bank (${code})`;
}

/**
 * IBAN layout used for branch-code extraction.
 * The branch code sits right after the 2-letter country code
 * and the 2 check digits.
 */
export const IBAN_LAYOUT = {
    COUNTRY_PREFIX: 'FR',
    MIN_LENGTH: 14,
    BRANCH_CODE_START: 4,
    BRANCH_CODE_END: 9,
} as const;

/**
 * Pipe export layout:
 * phone|full name|birth date|email|address|city (postal code)|iban|swift
 */
export const PIPE_FORMAT = {
    DELIMITER: '|',
    MIN_FIELDS: 7,
    FIELD: {
        PHONE: 0,
        FULL_NAME: 1,
        BIRTH_DATE: 2,
        EMAIL: 3,
        ADDRESS: 4,
        CITY_POSTAL: 5,
        IBAN: 6,
        SWIFT: 7,
    },
} as const;

/**
 * Canonical phone number: 10 digits, leading zero.
 */
export const CANONICAL_PHONE = /^0\d{9}$/;
