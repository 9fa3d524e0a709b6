import { parseArgs } from 'node:util';
import { loadCommand } from './commands/load.js';
import { lookupCommand } from './commands/lookup.js';
import { ibanCommand } from './commands/iban.js';
import { statsCommand } from './commands/stats.js';
import { log, fail } from './utils/console.js';
import type { CommandOptions } from './types.js';

export const USAGE = [
    'callcard - caller directory',
    '',
    'Usage:',
    '  callcard load <file.txt>               Load an export and report what was kept',
    '  callcard lookup <file.txt> <phone...>  Load an export and print a caller card per number',
    '  callcard iban <iban...>                Print the bank of each IBAN',
    '  callcard stats <file.txt>              Load an export and print bank statistics',
    '',
    'Options:',
    '  --config <path>  Configuration file (default: ./callcard.yaml)',
    '  -h, --help       Show this help',
].join('\n');

/**
 * Dispatches a command line.
 *
 * @param argv - Arguments after the executable and script
 * @returns Process exit code
 */
export async function run(argv: string[]): Promise<number> {
    let parsed: ReturnType<typeof parseCommandLine>;
    try {
        parsed = parseCommandLine(argv);
    } catch (err) {
        fail((err as Error).message);
        return 1;
    }

    const [command, ...rest] = parsed.positionals;
    if (parsed.values.help || !command) {
        log(USAGE);
        return 0;
    }

    const options: CommandOptions = { config: parsed.values.config };

    try {
        switch (command) {
            case 'load':
                await loadCommand(requireFile(rest), options);
                break;
            case 'lookup':
                await lookupCommand(requireFile(rest), rest.slice(1), options);
                break;
            case 'iban':
                await ibanCommand(rest);
                break;
            case 'stats':
                await statsCommand(requireFile(rest), options);
                break;
            default:
                fail(`Unknown command "${command}".`);
                log(USAGE);
                return 1;
        }
    } catch (err) {
        fail((err as Error).message);
        return 1;
    }

    return 0;
}

function parseCommandLine(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            config: { type: 'string' },
            help: { type: 'boolean', short: 'h' },
        },
    });
}

function requireFile(args: string[]): string {
    const [file] = args;
    if (!file) {
        throw new Error('Missing export file argument.');
    }
    return file;
}
