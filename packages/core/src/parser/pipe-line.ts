/**
 * Pipe-delimited client line parser.
 *
 * Format (7 or 8 fields):
 *   phone|full name|birth date|email|address|city (postal code)|iban[|swift]
 *
 * Lines are tolerated, not validated: a line that cannot yield a record is
 * skipped with a reason, and never aborts the batch.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Skip reasons returned as data.
 */

import { normalizePhone } from '../phone/normalize.js';
import { classify } from '../bank/classify.js';
import { CLIENT_STATUS, PIPE_FORMAT, PLACEHOLDER } from '../types/index.js';
import type { ClientRecord, LineResult } from '../types/index.js';
import type { ParseOptions } from './types.js';

const CITY_POSTAL_PATTERN = /^(.+?)\s*\((\d{5})\)/;

/**
 * Parse one export line into an explicit result.
 *
 * @param line - Raw line, without its line ending
 * @param options - Optional clock for uploaded_at
 * @returns Parsed record, or the reason the line was skipped
 */
export function parseLineResult(line: string, options: ParseOptions = {}): LineResult {
    if (!line.trim()) {
        return { status: 'skipped', reason: 'blank' };
    }

    try {
        const fields = line.split(PIPE_FORMAT.DELIMITER).map((f) => f.trim());
        if (fields.length < PIPE_FORMAT.MIN_FIELDS) {
            return { status: 'skipped', reason: 'too-few-fields' };
        }

        const phone = normalizePhone(fields[PIPE_FORMAT.FIELD.PHONE]);
        if (!phone) {
            return { status: 'skipped', reason: 'invalid-phone' };
        }

        const { lastName, firstName } = splitFullName(fields[PIPE_FORMAT.FIELD.FULL_NAME]);
        const { city, postalCode } = splitCityPostal(fields[PIPE_FORMAT.FIELD.CITY_POSTAL]);
        const iban = fields[PIPE_FORMAT.FIELD.IBAN];
        const now = options.now ?? (() => new Date());

        const record: ClientRecord = {
            last_name: lastName,
            first_name: firstName,
            birth_date: fields[PIPE_FORMAT.FIELD.BIRTH_DATE],
            email: fields[PIPE_FORMAT.FIELD.EMAIL],
            address: fields[PIPE_FORMAT.FIELD.ADDRESS],
            city,
            postal_code: postalCode,
            iban,
            swift: fields[PIPE_FORMAT.FIELD.SWIFT] ?? '',
            bank: iban ? classify(iban) : PLACEHOLDER,
            phone,
            gender: PLACEHOLDER,
            birthplace: PLACEHOLDER,
            profession: PLACEHOLDER,
            company: PLACEHOLDER,
            status: CLIENT_STATUS.PROSPECT,
            call_count: 0,
            last_call: null,
            uploaded_at: now().toISOString(),
            notes: '',
        };

        return { status: 'parsed', record };
    } catch {
        // Invalid Date from the clock: toISOString() throws RangeError.
        return { status: 'skipped', reason: 'error' };
    }
}

/**
 * Parse one export line.
 *
 * @returns The client record, or null if the line was skipped
 */
export function parseLine(line: string, options: ParseOptions = {}): ClientRecord | null {
    const result = parseLineResult(line, options);
    return result.status === 'parsed' ? result.record : null;
}

/**
 * Split "LASTNAME First Names" on the first space.
 * A single token is the last name with an empty first name.
 */
export function splitFullName(fullName: string): { lastName: string; firstName: string } {
    const space = fullName.indexOf(' ');
    if (space === -1) {
        return { lastName: fullName, firstName: '' };
    }
    return { lastName: fullName.slice(0, space), firstName: fullName.slice(space + 1) };
}

/**
 * Split "City (12345)". Without a 5-digit postal code in parentheses the
 * whole field is the city.
 */
export function splitCityPostal(field: string): { city: string; postalCode: string } {
    const match = CITY_POSTAL_PATTERN.exec(field);
    if (!match) {
        return { city: field, postalCode: '' };
    }
    return { city: match[1].trim(), postalCode: match[2] };
}
