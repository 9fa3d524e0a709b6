/**
 * Plain-text caller card for a looked-up client.
 * Four blocks: identity, contact, bank, status.
 */

import { CLIENT_STATUS, PLACEHOLDER, type BankStats, type ClientRecord } from '@callcard/shared';
import type { LookupContext } from '../types.js';

export interface CallerCardOptions {
    context: LookupContext;
    lineNumber: string;
    at: Date;
}

/**
 * dd/mm/yyyy HH:MM:SS in local time.
 */
export function formatTimestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return (
        `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
}

function show(value: string): string {
    return value || PLACEHOLDER;
}

export function formatCallerCard(client: ClientRecord, options: CallerCardOptions): string {
    const known = client.status !== CLIENT_STATUS.UNKNOWN;
    const title = options.context === 'call' ? 'INCOMING CALL' : 'LOOKUP';
    const postal = client.postal_code && client.postal_code !== PLACEHOLDER ? ` (${client.postal_code})` : '';

    return [
        `${known ? '📞' : '❓'} ${title}`,
        `Number: ${client.phone}`,
        `Line: ${options.lineNumber}`,
        `Time: ${formatTimestamp(options.at)}`,
        '',
        'IDENTITY',
        `  Last name: ${show(client.last_name)}`,
        `  First name: ${show(client.first_name)}`,
        `  Birth date: ${show(client.birth_date)}`,
        '',
        'CONTACT',
        `  Email: ${show(client.email)}`,
        `  Address: ${show(client.address)}`,
        `  City: ${show(client.city)}${postal}`,
        '',
        'BANK',
        `  Bank: ${show(client.bank)}`,
        `  SWIFT: ${show(client.swift)}`,
        `  IBAN: ${show(client.iban)}`,
        '',
        'STATUS',
        `  ${client.status} | Calls: ${client.call_count}`,
    ].join('\n');
}

/**
 * Bank distribution, largest group first.
 */
export function formatBankStats(stats: BankStats): string {
    const lines = [
        `Clients: ${stats.total_clients}`,
        `Crédit Agricole: ${stats.credit_agricole_count}`,
        `Other banks: ${stats.other_banks_count}`,
    ];

    const ranked = Object.entries(stats.by_bank).sort(([a, x], [b, y]) => y - x || a.localeCompare(b));
    if (ranked.length > 0) {
        lines.push('');
        for (const [bank, count] of ranked) {
            lines.push(`  ${bank}: ${count}`);
        }
    }
    return lines.join('\n');
}
