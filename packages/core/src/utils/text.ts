/**
 * Text decoding helpers for uploaded exports.
 */

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * Exports saved from spreadsheet tools often start with one, and it would
 * otherwise end up glued to the first phone number.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * Split text into lines, accepting both \n and \r\n endings.
 */
export function splitLines(text: string): string[] {
    return text.split(/\r?\n/);
}
