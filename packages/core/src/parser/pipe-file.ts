/**
 * Whole-export parser.
 *
 * Feeds every line through parseLineResult and aggregates the skips.
 * Warnings are one per skip reason, never one per line.
 */

import { stripBom, splitLines } from '../utils/text.js';
import { parseLineResult } from './pipe-line.js';
import { SkipReasonSchema } from '../types/index.js';
import type { ClientRecord, ParseResult, SkipReason } from '../types/index.js';
import type { ParseOptions } from './types.js';

const SKIP_DESCRIPTIONS: Record<SkipReason, string> = {
    'blank': 'blank',
    'too-few-fields': 'with fewer than 7 fields',
    'invalid-phone': 'with an unrecognized phone number',
    'error': 'that failed to parse',
};

/**
 * Parse a decoded export.
 *
 * Blank lines are skipped like any other unusable line but produce no
 * warning. A single trailing newline does not count as a line.
 *
 * @param text - Full decoded file content
 * @param options - Optional clock for uploaded_at
 */
export function parsePipeFile(text: string, options: ParseOptions = {}): ParseResult {
    const content = stripBom(text).replace(/\r?\n$/, '');
    const lines = content ? splitLines(content) : [];

    const records: ClientRecord[] = [];
    const skipReasons: Partial<Record<SkipReason, number>> = {};
    let skippedLines = 0;

    for (const line of lines) {
        const result = parseLineResult(line, options);
        if (result.status === 'parsed') {
            records.push(result.record);
            continue;
        }
        skippedLines++;
        skipReasons[result.reason] = (skipReasons[result.reason] ?? 0) + 1;
    }

    const warnings: string[] = [];
    for (const reason of SkipReasonSchema.options) {
        const count = skipReasons[reason];
        if (reason === 'blank' || !count) {
            continue;
        }
        warnings.push(`Skipped ${count} line(s) ${SKIP_DESCRIPTIONS[reason]}`);
    }

    return {
        records,
        lineCount: lines.length,
        skippedLines,
        skipReasons,
        warnings,
    };
}
