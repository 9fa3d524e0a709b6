import { CLIENT_STATUS, PLACEHOLDER, UNKNOWN_CLIENT } from '../types/index.js';
import type { ClientRecord } from '../types/index.js';

/**
 * Synthesize the record returned on a directory miss.
 * The phone is kept exactly as received, normalized or not.
 */
export function createUnknownClient(rawPhone: string): ClientRecord {
    return {
        last_name: UNKNOWN_CLIENT.LAST_NAME,
        first_name: UNKNOWN_CLIENT.FIRST_NAME,
        birth_date: PLACEHOLDER,
        email: PLACEHOLDER,
        address: PLACEHOLDER,
        city: PLACEHOLDER,
        postal_code: PLACEHOLDER,
        iban: PLACEHOLDER,
        swift: PLACEHOLDER,
        bank: PLACEHOLDER,
        phone: rawPhone,
        gender: PLACEHOLDER,
        birthplace: PLACEHOLDER,
        profession: PLACEHOLDER,
        company: PLACEHOLDER,
        status: CLIENT_STATUS.UNKNOWN,
        call_count: 0,
        last_call: null,
        uploaded_at: null,
        notes: '',
    };
}
