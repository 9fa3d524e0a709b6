import { loadConfig } from '../config/load-config.js';
import { formatCallerCard } from '../format/caller-card.js';
import { log } from '../utils/console.js';
import { loadDirectory } from './load.js';
import type { CommandOptions } from '../types.js';

/**
 * Loads an export, then prints a caller card per phone number.
 * Repeating a number counts a call each time.
 */
export async function lookupCommand(path: string, phones: string[], options: CommandOptions): Promise<void> {
    if (phones.length === 0) {
        throw new Error('No phone number given. Usage: callcard lookup <file> <phone...>');
    }

    const config = loadConfig(options.config);
    const { directory } = await loadDirectory(path, config);

    for (const phone of phones) {
        const client = directory.lookup(phone);
        log('');
        log(formatCallerCard(client, { context: 'search', lineNumber: config.line_number, at: new Date() }));
    }
}
