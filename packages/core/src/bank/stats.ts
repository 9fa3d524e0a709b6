/**
 * Bank distribution over loaded clients.
 *
 * Clients without an IBAN are counted in total_clients only.
 */

import { classifyIban } from './classify.js';
import type { BankStats, ClientRecord } from '../types/index.js';

export function summarizeBanks(records: Iterable<ClientRecord>): BankStats {
    const byBank: Record<string, number> = {};
    let total = 0;
    let creditAgricole = 0;
    let other = 0;

    for (const record of records) {
        total++;
        if (!record.iban) {
            continue;
        }

        const { label, kind } = classifyIban(record.iban);
        byBank[label] = (byBank[label] ?? 0) + 1;

        if (kind === 'credit-agricole') {
            creditAgricole++;
        } else {
            other++;
        }
    }

    return {
        total_clients: total,
        by_bank: byBank,
        credit_agricole_count: creditAgricole,
        other_banks_count: other,
    };
}
