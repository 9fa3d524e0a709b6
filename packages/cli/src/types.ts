/**
 * callcard CLI - Core Types
 */

export interface CommandOptions {
    /** Explicit path to callcard.yaml. */
    config?: string;
}

/**
 * A decoded export file ready for the core.
 */
export interface ExportFile {
    path: string;
    filename: string;
    text: string;
}

export type LookupContext = 'call' | 'search';
