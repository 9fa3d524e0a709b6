/**
 * Export line builder for tests.
 */
export function exportLine(phone: string, name: string, iban = '', swift = 'TESTFRPP'): string {
    return [phone, name, '01/02/1985', 'client@example.com', '3 place du Marché', 'Nantes (44000)', iban, swift].join('|');
}

export const IBAN = {
    CREDIT_AGRICOLE: 'FR76 1390 6000 0012 3456 7890 189',
    SOCIETE_GENERALE: 'FR7630003000701234567890185',
    UNLISTED: 'FR7612345000001234567890189',
    GERMAN: 'DE89370400440532013000',
} as const;
