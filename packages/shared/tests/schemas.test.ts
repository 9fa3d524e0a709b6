import { describe, it, expect } from 'vitest';
import {
    CanonicalPhoneSchema,
    ClientRecordSchema,
    BankCodeTableSchema,
    LineResultSchema,
    LoadResultSchema,
    CliConfigSchema,
} from '../src/schemas.js';

describe('ClientRecordSchema', () => {
    const validRecord = {
        last_name: 'DUPONT',
        first_name: 'Jean',
        birth_date: '12/03/1980',
        email: 'jean.dupont@example.com',
        address: '12 rue des Lilas',
        city: 'Lyon',
        postal_code: '69003',
        iban: 'FR7613906000001234567890189',
        swift: 'AGRIFRPP839',
        bank: 'Crédit Agricole Centre-est',
        phone: '0669290606',
        gender: 'N/A',
        birthplace: 'N/A',
        profession: 'N/A',
        company: 'N/A',
        status: 'Prospect',
        call_count: 0,
        last_call: null,
        uploaded_at: '2026-03-01T09:30:00.000Z',
        notes: '',
    };

    it('validates a complete record', () => {
        expect(ClientRecordSchema.safeParse(validRecord).success).toBe(true);
    });

    it('accepts an Unknown record without upload time', () => {
        const unknown = { ...validRecord, status: 'Unknown', uploaded_at: null };
        expect(ClientRecordSchema.safeParse(unknown).success).toBe(true);
    });

    it('rejects an unknown status', () => {
        expect(ClientRecordSchema.safeParse({ ...validRecord, status: 'Client' }).success).toBe(false);
    });

    it('rejects a negative call_count', () => {
        expect(ClientRecordSchema.safeParse({ ...validRecord, call_count: -1 }).success).toBe(false);
    });

    it('rejects a non-ISO last_call', () => {
        expect(ClientRecordSchema.safeParse({ ...validRecord, last_call: '01/03/2026 09:30:00' }).success).toBe(false);
    });
});

describe('CanonicalPhoneSchema', () => {
    it('accepts 10 digits with a leading zero', () => {
        expect(CanonicalPhoneSchema.safeParse('0669290606').success).toBe(true);
    });

    it('rejects other shapes', () => {
        expect(CanonicalPhoneSchema.safeParse('+33669290606').success).toBe(false);
        expect(CanonicalPhoneSchema.safeParse('669290606').success).toBe(false);
    });
});

describe('BankCodeTableSchema', () => {
    it('accepts 5-digit codes', () => {
        const table = { '13906': { name: 'Crédit Agricole Centre-est', network: 'credit-agricole' } };
        expect(BankCodeTableSchema.safeParse(table).success).toBe(true);
    });

    it('rejects malformed codes and networks', () => {
        expect(BankCodeTableSchema.safeParse({ '1390': { name: 'X', network: 'other' } }).success).toBe(false);
        expect(BankCodeTableSchema.safeParse({ '13906': { name: 'X', network: 'mutual' } }).success).toBe(false);
    });
});

describe('LineResultSchema', () => {
    it('validates a skipped line', () => {
        expect(LineResultSchema.safeParse({ status: 'skipped', reason: 'invalid-phone' }).success).toBe(true);
    });

    it('rejects an unknown skip reason', () => {
        expect(LineResultSchema.safeParse({ status: 'skipped', reason: 'too-long' }).success).toBe(false);
    });
});

describe('LoadResultSchema', () => {
    it('validates a load report', () => {
        const report = {
            lineCount: 4,
            skippedLines: 1,
            skipReasons: { 'too-few-fields': 1 },
            warnings: ['Skipped 1 line(s) with fewer than 7 fields'],
            stored: 3,
            duplicates: 0,
            loadedAt: '2026-03-01T09:30:00.000Z',
        };
        expect(LoadResultSchema.safeParse(report).success).toBe(true);
    });
});

describe('CliConfigSchema', () => {
    it('applies defaults to an empty config', () => {
        expect(CliConfigSchema.parse({})).toEqual({ line_number: 'N/A', allowed_extensions: ['.txt'] });
    });

    it('rejects extensions without a leading dot', () => {
        expect(CliConfigSchema.safeParse({ allowed_extensions: ['txt'] }).success).toBe(false);
    });

    it('rejects an empty extension list', () => {
        expect(CliConfigSchema.safeParse({ allowed_extensions: [] }).success).toBe(false);
    });
});
