/**
 * Unit tests for configuration path utilities
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import _ from 'lodash';
import {
    filterExisting,
    getCandidateSourcePaths,
    getDataDir,
    getProxyLogDir,
    getProxyLogPath,
    getProxySettingsPath,
    getSupplementalSourcePaths
} from '../../src/utils/config-paths.js';
import { cleanup, createTempDir, createTempFile } from '../helpers/fs-utils.js';

describe('Config Paths', () => {
    afterEach(async () => {
        await cleanup();
    });

    describe('data files', () => {
        it('keeps settings and logs under the data directory', () => {
            expect(getProxySettingsPath()).toBe(join(getDataDir(), 'proxy-settings.json'));
            expect(getProxyLogDir()).toBe(join(getDataDir(), 'proxy-logs'));
        });

        it('names the data directory after the project', () => {
            expect(_.includes(getDataDir(), 'mcp-switchboard')).toBe(true);
        });

        it('names log files by start time in seconds', () => {
            expect(getProxyLogPath(new Date(1700000000999))).toBe(join(getProxyLogDir(), 'proxy-1700000000.jsonl'));
        });
    });

    describe('source locations', () => {
        it('lists explicit locations in priority order', () => {
            expect(getCandidateSourcePaths('/home/ada', '/work')).toEqual([
                join('/home/ada', 'Library', 'Application Support', 'Claude', 'claude_desktop_config.json'),
                join('/home/ada', 'mcp.json'),
                join('/home/ada', '.config', 'github-copilot', 'intellij', 'mcp.json'),
                join('/home/ada', '.config', 'mcp', 'config.json'),
                join('/home/ada', '.mcp', 'config.json'),
                join('/work', 'mcp.json'),
                join('/work', '.mcp.json'),
            ]);
        });

        it('lists other clients as supplemental locations', () => {
            expect(getSupplementalSourcePaths('/home/ada')).toEqual([
                join('/home/ada', '.cursor', 'mcp.json'),
                join('/home/ada', '.codeium', 'windsurf', 'mcp_config.json'),
                join('/home/ada', '.claude.json'),
            ]);
        });

        it('keeps only existing files, in order', async () => {
            const dir = await createTempDir();
            const second = await createTempFile('{}', { directory: dir, filename: 'b.json' });
            const first = await createTempFile('{}', { directory: dir, filename: 'a.json' });

            expect(await filterExisting([join(dir, 'missing.json'), first, second])).toEqual([first, second]);
        });
    });
});
