import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'yaml';
import { CliConfigSchema, type CliConfig } from '@callcard/shared';

export const DEFAULT_CONFIG_FILE = 'callcard.yaml';

/**
 * Loads callcard.yaml.
 *
 * Without an explicit path the file is looked up in `cwd`, and a missing
 * file means defaults. An explicit path must exist.
 */
export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): CliConfig {
    const path = explicitPath ?? join(cwd, DEFAULT_CONFIG_FILE);

    if (!existsSync(path)) {
        if (explicitPath) {
            throw new Error(`Config file not found: ${path}`);
        }
        return CliConfigSchema.parse({});
    }

    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content) ?? {};

    const result = CliConfigSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new Error(`Invalid config ${path}: ${issues.join('; ')}`);
    }
    return result.data;
}
