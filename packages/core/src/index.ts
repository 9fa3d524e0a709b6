// Types (re-exported from shared)
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
} from './types/index.js';

export {
    ClientRecordSchema,
    PLACEHOLDER,
    CLIENT_STATUS,
    UNKNOWN_CLIENT,
    BANK_LABEL,
} from './types/index.js';

// Utils
export { stripBom, splitLines } from './utils/index.js';

// Phone
export { normalizePhone, PHONE_PATTERNS } from './phone/normalize.js';

// Bank
export { classify, classifyIban, cleanIban, BANK_CODES, lookupBankCode, summarizeBanks } from './bank/index.js';

// Parser
export { parseLine, parseLineResult, parsePipeFile, splitFullName, splitCityPostal } from './parser/index.js';
export type { ParseOptions } from './parser/index.js';

// Directory
export { ClientDirectory, createUnknownClient } from './directory/index.js';
export type { ClientDirectoryOptions, LoadOptions } from './directory/index.js';
