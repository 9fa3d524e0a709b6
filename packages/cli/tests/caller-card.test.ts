import { describe, it, expect } from 'vitest';
import { createUnknownClient, type ClientRecord } from '@callcard/core';
import { formatCallerCard, formatTimestamp, formatBankStats } from '../src/format/caller-card.js';

const at = new Date(2026, 2, 1, 9, 5, 7);

const client: ClientRecord = {
    last_name: 'BERNARD',
    first_name: 'Luc',
    birth_date: '01/02/1985',
    email: 'luc@example.com',
    address: '3 place du Marché',
    city: 'Nantes',
    postal_code: '44000',
    iban: 'FR7613906000001234567890189',
    swift: '',
    bank: 'Crédit Agricole Centre-est',
    phone: '0601020304',
    gender: 'N/A',
    birthplace: 'N/A',
    profession: 'N/A',
    company: 'N/A',
    status: 'Prospect',
    call_count: 2,
    last_call: '2026-03-01T09:05:07.000Z',
    uploaded_at: '2026-03-01T08:00:00.000Z',
    notes: '',
};

describe('formatTimestamp', () => {
    it('formats local time as dd/mm/yyyy HH:MM:SS', () => {
        expect(formatTimestamp(at)).toBe('01/03/2026 09:05:07');
    });
});

describe('formatCallerCard', () => {
    it('renders the four blocks for a known client', () => {
        expect(formatCallerCard(client, { context: 'call', lineNumber: '0185093039', at })).toBe(
            [
                '📞 INCOMING CALL',
                'Number: 0601020304',
                'Line: 0185093039',
                'Time: 01/03/2026 09:05:07',
                '',
                'IDENTITY',
                '  Last name: BERNARD',
                '  First name: Luc',
                '  Birth date: 01/02/1985',
                '',
                'CONTACT',
                '  Email: luc@example.com',
                '  Address: 3 place du Marché',
                '  City: Nantes (44000)',
                '',
                'BANK',
                '  Bank: Crédit Agricole Centre-est',
                '  SWIFT: N/A',
                '  IBAN: FR7613906000001234567890189',
                '',
                'STATUS',
                '  Prospect | Calls: 2',
            ].join('\n')
        );
    });

    it('marks unknown callers and hides the placeholder postal code', () => {
        const card = formatCallerCard(createUnknownClient('+33 6 99 99 99 99'), {
            context: 'search',
            lineNumber: 'N/A',
            at,
        });
        const lines = card.split('\n');

        expect(lines[0]).toBe('❓ LOOKUP');
        expect(lines[1]).toBe('Number: +33 6 99 99 99 99');
        expect(lines).toContain('  Last name: UNKNOWN');
        expect(lines).toContain('  City: N/A');
        expect(lines[lines.length - 1]).toBe('  Unknown | Calls: 0');
    });
});

describe('formatBankStats', () => {
    it('lists banks by count, then by name', () => {
        const text = formatBankStats({
            total_clients: 5,
            by_bank: { 'Société Générale': 1, 'Crédit Agricole Centre-est': 2, 'BRED': 1 },
            credit_agricole_count: 2,
            other_banks_count: 2,
        });

        expect(text).toBe(
            [
                'Clients: 5',
                'Crédit Agricole: 2',
                'Other banks: 2',
                '',
                '  Crédit Agricole Centre-est: 2',
                '  BRED: 1',
                '  Société Générale: 1',
            ].join('\n')
        );
    });

    it('omits the list when no client has an IBAN', () => {
        expect(formatBankStats({ total_clients: 1, by_bank: {}, credit_agricole_count: 0, other_banks_count: 0 })).toBe(
            'Clients: 1\nCrédit Agricole: 0\nOther banks: 0'
        );
    });
});
