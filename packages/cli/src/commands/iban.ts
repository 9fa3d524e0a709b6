import { classify } from '@callcard/core';
import { log } from '../utils/console.js';

export async function ibanCommand(ibans: string[]): Promise<void> {
    if (ibans.length === 0) {
        throw new Error('No IBAN given. Usage: callcard iban <iban...>');
    }
    for (const iban of ibans) {
        log(`${iban} → ${classify(iban)}`);
    }
}
