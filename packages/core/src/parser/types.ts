/**
 * Internal types for parser module.
 */

/**
 * Options shared by line and file parsing.
 */
export interface ParseOptions {
    /** Clock used for uploaded_at. Defaults to the system clock. */
    now?: () => Date;
}
