/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    ClientStatus,
    ClientRecord,
    BankKind,
    BankClassification,
    BankCodeEntry,
    BankCodeTable,
    BankStats,
    SkipReason,
    LineResult,
    ParseResult,
    LoadResult,
    DirectoryStats,
} from '@callcard/shared';

export {
    ClientRecordSchema,
    BankCodeTableSchema,
    SkipReasonSchema,
    PLACEHOLDER,
    CLIENT_STATUS,
    UNKNOWN_CLIENT,
    BANK_LABEL,
    IBAN_LAYOUT,
    PIPE_FORMAT,
    CANONICAL_PHONE,
    frenchBankLabel,
} from '@callcard/shared';
