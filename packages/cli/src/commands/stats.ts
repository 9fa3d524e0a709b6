import { summarizeBanks } from '@callcard/core';
import { formatBankStats } from '../format/caller-card.js';
import { log, arrow } from '../utils/console.js';
import { loadConfig } from '../config/load-config.js';
import { loadDirectory } from './load.js';
import type { CommandOptions } from '../types.js';

export async function statsCommand(path: string, options: CommandOptions): Promise<void> {
    const { directory, file, report } = await loadDirectory(path, loadConfig(options.config));

    log(`\ncallcard - Bank statistics for ${file.filename}`);
    arrow(`Loaded at: ${report.loadedAt}`);
    log('');
    log(formatBankStats(summarizeBanks(directory.records())));
}
