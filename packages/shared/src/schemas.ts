/**
 * Zod schemas for caller directory data structures.
 *
 * Timestamps are ISO-8601 strings. The core stamps them from an
 * injectable clock so tests can pin them.
 */

import { z } from 'zod';
import { CANONICAL_PHONE } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO-8601 timestamp as produced by Date#toISOString().
 */
const isoTimestamp = z.string().datetime();

/**
 * Canonical phone number: 10 digits, leading zero.
 */
export const CanonicalPhoneSchema = z.string().regex(CANONICAL_PHONE, 'Must be 10 digits starting with 0');

const count = z.number().int().min(0);

// ============================================================================
// Client Record
// ============================================================================

export const ClientStatusSchema = z.enum(['Prospect', 'Unknown']);

export type ClientStatus = z.infer<typeof ClientStatusSchema>;

/**
 * One customer, as stored in the directory or synthesized on a miss.
 *
 * `phone` is canonical for Prospect records. Unknown records carry the raw
 * lookup input verbatim, so the field is a plain string here.
 */
export const ClientRecordSchema = z.object({
    last_name: z.string(),
    first_name: z.string(),
    birth_date: z.string(),
    email: z.string(),
    address: z.string(),
    city: z.string(),
    postal_code: z.string(),
    iban: z.string(),
    swift: z.string(),
    bank: z.string(),
    phone: z.string(),
    gender: z.string(),
    birthplace: z.string(),
    profession: z.string(),
    company: z.string(),
    status: ClientStatusSchema,
    call_count: count,
    last_call: isoTimestamp.nullable(),
    uploaded_at: isoTimestamp.nullable(),
    notes: z.string(),
});

export type ClientRecord = z.infer<typeof ClientRecordSchema>;

// ============================================================================
// Bank Classification
// ============================================================================

/**
 * credit-agricole: listed regional Crédit Agricole code.
 * other-listed: listed code of another institution.
 * unlisted: French IBAN whose code is not in the table.
 */
export const BankKindSchema = z.enum(['credit-agricole', 'other-listed', 'unlisted', 'foreign', 'invalid']);

export type BankKind = z.infer<typeof BankKindSchema>;

export const BankClassificationSchema = z.object({
    label: z.string(),
    kind: BankKindSchema,
    code: z.string().nullable(),
});

export type BankClassification = z.infer<typeof BankClassificationSchema>;

/**
 * Entry of the bundled branch-code table.
 */
export const BankCodeEntrySchema = z.object({
    name: z.string().min(1),
    network: z.enum(['credit-agricole', 'other']),
});

export type BankCodeEntry = z.infer<typeof BankCodeEntrySchema>;

export const BankCodeTableSchema = z.record(z.string().regex(/^\d{5}$/, 'Must be a 5-digit branch code'), BankCodeEntrySchema);

export type BankCodeTable = z.infer<typeof BankCodeTableSchema>;

/**
 * Bank distribution over a set of clients.
 */
export const BankStatsSchema = z.object({
    total_clients: count,
    by_bank: z.record(z.string(), count),
    credit_agricole_count: count,
    other_banks_count: count,
});

export type BankStats = z.infer<typeof BankStatsSchema>;

// ============================================================================
// Parsing and Loading
// ============================================================================

export const SkipReasonSchema = z.enum(['blank', 'too-few-fields', 'invalid-phone', 'error']);

export type SkipReason = z.infer<typeof SkipReasonSchema>;

/**
 * Outcome of parsing one export line.
 */
export const LineResultSchema = z.discriminatedUnion('status', [
    z.object({ status: z.literal('parsed'), record: ClientRecordSchema }),
    z.object({ status: z.literal('skipped'), reason: SkipReasonSchema }),
]);

export type LineResult = z.infer<typeof LineResultSchema>;

/**
 * Result of parsing a whole export.
 * Parsers return data, not side effects. Warnings are aggregated per reason.
 */
export const ParseResultSchema = z.object({
    records: z.array(ClientRecordSchema),
    lineCount: count,
    skippedLines: count,
    skipReasons: z.record(SkipReasonSchema, count),
    warnings: z.array(z.string()),
});

export type ParseResult = z.infer<typeof ParseResultSchema>;

/**
 * Result of a directory load.
 * `duplicates` counts records that overwrote an earlier line with the same
 * canonical phone.
 */
export const LoadResultSchema = ParseResultSchema.omit({ records: true }).extend({
    stored: count,
    duplicates: count,
    loadedAt: isoTimestamp,
});

export type LoadResult = z.infer<typeof LoadResultSchema>;

export const DirectoryStatsSchema = z.object({
    total_clients: count,
    last_upload: isoTimestamp.nullable(),
    total_lookups: count,
    source: z.string().nullable(),
});

export type DirectoryStats = z.infer<typeof DirectoryStatsSchema>;

// ============================================================================
// CLI Configuration
// ============================================================================

/**
 * callcard.yaml
 */
export const CliConfigSchema = z.object({
    line_number: z.string().min(1).default('N/A'),
    allowed_extensions: z
        .array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'Must look like ".txt"'))
        .min(1)
        .default(['.txt']),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;
