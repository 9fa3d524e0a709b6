// Schemas
export {
    CanonicalPhoneSchema,
    ClientStatusSchema,
    ClientRecordSchema,
    BankKindSchema,
    BankClassificationSchema,
    BankCodeEntrySchema,
    BankCodeTableSchema,
    BankStatsSchema,
    SkipReasonSchema,
    LineResultSchema,
    ParseResultSchema,
    LoadResultSchema,
    DirectoryStatsSchema,
    CliConfigSchema,
} from './schemas.js';

// Types
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
    CliConfig,
} from './schemas.js';

// Constants
export {
    PLACEHOLDER,
    CLIENT_STATUS,
    UNKNOWN_CLIENT,
    BANK_LABEL,
    IBAN_LAYOUT,
    PIPE_FORMAT,
    CANONICAL_PHONE,
    frenchBankLabel,
} from './constants.js';
