import { ClientDirectory, type LoadResult } from '@callcard/core';
import type { CliConfig } from '@callcard/shared';
import { loadConfig } from '../config/load-config.js';
import { readExport } from '../io/read-export.js';
import { log, success, warn, arrow } from '../utils/console.js';
import type { CommandOptions, ExportFile } from '../types.js';

/**
 * Reads an export and loads it into a fresh directory.
 * Shared by every command that needs a populated directory.
 */
export async function loadDirectory(
    path: string,
    config: CliConfig
): Promise<{ directory: ClientDirectory; file: ExportFile; report: LoadResult; elapsedMs: number }> {
    const file = await readExport(path, config);

    const directory = new ClientDirectory();
    const start = performance.now();
    const report = directory.loadWithReport(file.text, { source: file.filename });
    const elapsedMs = performance.now() - start;

    return { directory, file, report, elapsedMs };
}

export async function loadCommand(path: string, options: CommandOptions): Promise<void> {
    const { file, report, elapsedMs } = await loadDirectory(path, loadConfig(options.config));

    log(`\ncallcard - Loading ${file.filename}`);

    for (const w of report.warnings) {
        warn(w);
    }

    success(`${report.stored} clients loaded in ${elapsedMs.toFixed(1)} ms`);
    arrow(`Lines read: ${report.lineCount}`);
    arrow(`Lines skipped: ${report.skippedLines}`);
    if (report.duplicates > 0) {
        arrow(`Duplicate numbers overwritten: ${report.duplicates}`);
    }
}
