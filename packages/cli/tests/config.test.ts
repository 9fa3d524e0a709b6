import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { loadConfig } from '../src/config/load-config.js';

vi.mock('node:fs');

describe('loadConfig', () => {
    const cwd = '/work';

    beforeEach(() => {
        vi.resetAllMocks();
    });

    it('returns defaults when no callcard.yaml exists', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(loadConfig(undefined, cwd)).toEqual({ line_number: 'N/A', allowed_extensions: ['.txt'] });
        expect(fs.existsSync).toHaveBeenCalledWith(path.join(cwd, 'callcard.yaml'));
    });

    it('fails when an explicit file is missing', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(() => loadConfig('/etc/callcard.yaml', cwd)).toThrow('Config file not found: /etc/callcard.yaml');
    });

    it('reads and validates the YAML file', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('line_number: "0185093039"\nallowed_extensions: [".txt", ".csv"]\n');

        expect(loadConfig(undefined, cwd)).toEqual({
            line_number: '0185093039',
            allowed_extensions: ['.txt', '.csv'],
        });
    });

    it('treats an empty file as defaults', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('');

        expect(loadConfig(undefined, cwd)).toEqual({ line_number: 'N/A', allowed_extensions: ['.txt'] });
    });

    it('reports invalid values with their path', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('allowed_extensions: ["txt"]\n');

        expect(() => loadConfig(undefined, cwd)).toThrow('allowed_extensions.0: Must look like ".txt"');
    });
});
