/**
 * Phone number normalization for directory keys.
 *
 * Canonical form: 10 digits with a leading 0 (French national format).
 * Callers compare numbers only after this normalization.
 */

import { CANONICAL_PHONE } from '../types/index.js';

/**
 * Accepted shapes, tried in order. The first match wins, and each captures
 * the 9 national digits that follow the prefix.
 */
export const PHONE_PATTERNS: readonly RegExp[] = [
    /^0033(\d{9})$/,
    /^\+33(\d{9})$/,
    /^33(\d{9})$/,
    /^0(\d{9})$/,
    /^(\d{9})$/,
];

/**
 * Normalize a raw phone string to its canonical 10-digit form.
 *
 * Everything except digits and `+` is stripped first, so spaces, dots,
 * dashes and parentheses are all accepted as separators.
 *
 * @param raw - Phone number as typed, exported or received from telephony
 * @returns Canonical number, or null when no accepted shape matches
 */
export function normalizePhone(raw: string): string | null {
    if (!raw) return null;

    const cleaned = raw.replace(/[^\d+]/g, '');

    for (const pattern of PHONE_PATTERNS) {
        const match = pattern.exec(cleaned);
        if (!match) {
            continue;
        }
        const candidate = `0${match[1]}`;
        return CANONICAL_PHONE.test(candidate) ? candidate : null;
    }

    return null;
}
