import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { stripBom } from '@callcard/core';
import type { CliConfig } from '@callcard/shared';
import type { ExportFile } from '../types.js';

/**
 * Reads a client export from disk.
 * The CLI owns all file I/O; the core only ever sees the decoded text.
 */
export async function readExport(path: string, config: CliConfig): Promise<ExportFile> {
    const filename = basename(path);
    const extension = extname(filename).toLowerCase();

    if (!config.allowed_extensions.some((allowed) => allowed.toLowerCase() === extension)) {
        throw new Error(
            `Unsupported file "${filename}". Expected one of: ${config.allowed_extensions.join(', ')}`
        );
    }

    let buffer: Buffer;
    try {
        buffer = await readFile(path);
    } catch (err) {
        throw new Error(`Cannot read ${path}: ${(err as Error).message}`);
    }

    return { path, filename, text: stripBom(buffer.toString('utf-8')) };
}
