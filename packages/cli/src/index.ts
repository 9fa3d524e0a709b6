#!/usr/bin/env node
/**
 * callcard CLI
 *
 * The CLI handles all file I/O and printing. The core receives decoded
 * text and returns records and reports as data.
 */

import { run } from './cli.js';

run(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err) => {
        console.error('Unexpected error:', (err as Error).message);
        process.exitCode = 1;
    });
