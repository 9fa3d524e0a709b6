/**
 * In-memory client directory keyed by canonical phone number.
 *
 * Replacement is all-or-nothing: load() builds a new Map off to the side and
 * swaps the reference. Every method is synchronous, so on Node's event loop
 * no lookup can interleave with a load or with another lookup; the call
 * counter increment needs no further locking.
 *
 * Records never leave the directory by reference. lookup(), peek() and
 * records() all hand out copies.
 */

import { normalizePhone } from '../phone/normalize.js';
import { parsePipeFile } from '../parser/pipe-file.js';
import { createUnknownClient } from './unknown.js';
import type { ClientRecord, DirectoryStats, LoadResult } from '../types/index.js';

export interface ClientDirectoryOptions {
    /** Clock for uploaded_at, last_call and last_upload. */
    now?: () => Date;
}

export interface LoadOptions {
    /** Label of the ingested source, e.g. the uploaded file name. */
    source?: string;
}

export class ClientDirectory {
    private entries = new Map<string, ClientRecord>();
    private lastUpload: string | null = null;
    private totalLookups = 0;
    private source: string | null = null;
    private readonly now: () => Date;

    constructor(options: ClientDirectoryOptions = {}) {
        this.now = options.now ?? (() => new Date());
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Replace the directory with the clients parsed from an export.
     *
     * @param rawText - Decoded export content
     * @returns Number of records stored
     */
    load(rawText: string, options: LoadOptions = {}): number {
        return this.loadWithReport(rawText, options).stored;
    }

    /**
     * Same as load(), returning the full parse report.
     * Later lines overwrite earlier ones with the same canonical phone.
     */
    loadWithReport(rawText: string, options: LoadOptions = {}): LoadResult {
        const parsed = parsePipeFile(rawText, { now: this.now });

        const next = new Map<string, ClientRecord>();
        for (const record of parsed.records) {
            next.set(record.phone, record);
        }

        const loadedAt = this.now().toISOString();
        this.entries = next;
        this.lastUpload = loadedAt;
        this.totalLookups = 0;
        this.source = options.source ?? null;

        return {
            lineCount: parsed.lineCount,
            skippedLines: parsed.skippedLines,
            skipReasons: parsed.skipReasons,
            warnings: parsed.warnings,
            stored: next.size,
            duplicates: parsed.records.length - next.size,
            loadedAt,
        };
    }

    /**
     * Look up a caller.
     *
     * On a hit the stored record's call_count and last_call are updated and
     * a copy reflecting the update is returned. On a miss, or when the
     * number cannot be normalized, an Unknown record is synthesized and
     * nothing is stored.
     */
    lookup(rawPhone: string): ClientRecord {
        const phone = normalizePhone(rawPhone);
        const stored = phone ? this.entries.get(phone) : undefined;
        if (!stored) {
            return createUnknownClient(rawPhone);
        }

        stored.call_count += 1;
        stored.last_call = this.now().toISOString();
        this.totalLookups += 1;

        return { ...stored };
    }

    /**
     * Read a stored record without counting a call.
     */
    peek(rawPhone: string): ClientRecord | null {
        const phone = normalizePhone(rawPhone);
        const stored = phone ? this.entries.get(phone) : undefined;
        return stored ? { ...stored } : null;
    }

    has(rawPhone: string): boolean {
        const phone = normalizePhone(rawPhone);
        return phone !== null && this.entries.has(phone);
    }

    /**
     * Copies of all stored records, in load order.
     */
    records(): ClientRecord[] {
        return Array.from(this.entries.values(), (record) => ({ ...record }));
    }

    stats(): DirectoryStats {
        return {
            total_clients: this.entries.size,
            last_upload: this.lastUpload,
            total_lookups: this.totalLookups,
            source: this.source,
        };
    }

    /**
     * Empty the directory and reset its counters.
     *
     * @returns Number of records removed
     */
    clear(): number {
        const removed = this.entries.size;
        this.entries = new Map();
        this.lastUpload = null;
        this.totalLookups = 0;
        this.source = null;
        return removed;
    }
}
