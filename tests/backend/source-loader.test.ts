/**
 * Unit tests for configuration source loading
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import { extractServerMap, loadSources, parseSource } from '../../src/backend/source-loader.js';
import { SourceParseError } from '../../src/utils/errors.js';
import { cleanup, createTempDir, createTempFile } from '../helpers/fs-utils.js';

describe('extractServerMap', () => {
    it('prefers mcpServers over servers', () => {
        expect(extractServerMap({ mcpServers: { a: {} }, servers: { b: {} } })).toEqual({ a: {} });
    });

    it('falls back to servers', () => {
        expect(extractServerMap({ servers: { b: {} } })).toEqual({ b: {} });
    });

    it('treats the whole document as the map otherwise', () => {
        expect(extractServerMap({ c: { command: 'node' } })).toEqual({ c: { command: 'node' } });
    });
});

describe('parseSource', () => {
    it('lists entries in document order', () => {
        const source = parseSource('/cfg/mcp.json', JSON.stringify({ mcpServers: { b: { command: 'b' }, a: { url: 'x', type: 'http' } } }));

        expect(source).toEqual({
            path:    '/cfg/mcp.json',
            entries: [
                { name: 'b', raw: { command: 'b' } },
                { name: 'a', raw: { url: 'x', type: 'http' } },
            ],
        });
    });

    it('keeps the last of duplicate keys', () => {
        const source = parseSource('/cfg/mcp.json', '{"mcpServers": {"a": {"command": "one"}, "a": {"command": "two"}}}');

        expect(source.entries).toEqual([{ name: 'a', raw: { command: 'two' } }]);
    });

    it('rejects invalid JSON', () => {
        expect(() => parseSource('/cfg/bad.json', '{ not json')).toThrow(SourceParseError);
        expect(() => parseSource('/cfg/bad.json', '{ not json')).toThrow(/^Invalid JSON: /);
    });

    it('rejects a document that is not an object', () => {
        expect(() => parseSource('/cfg/list.json', '[]')).toThrow('Config must be a JSON object');
    });

    it('rejects a server map that is not an object', () => {
        expect(() => parseSource('/cfg/list.json', '{"mcpServers": ["a"]}')).toThrow('Invalid servers format');
    });
});

describe('loadSources', () => {
    afterEach(async () => {
        await cleanup();
    });

    it('loads the readable sources and skips the rest with a reason', async () => {
        const dir = await createTempDir();
        const good = await createTempFile({ mcpServers: { files: { command: 'node' } } }, { directory: dir, filename: 'good.json' });
        const corrupt = await createTempFile('{"mcpServers":', { directory: dir, filename: 'corrupt.json' });
        const missing = join(dir, 'missing.json');

        const { sources, skipped } = await loadSources([missing, good, corrupt]);

        expect(sources).toEqual([{ path: good, entries: [{ name: 'files', raw: { command: 'node' } }] }]);
        expect(skipped.map(source => source.path)).toEqual([missing, corrupt]);
        expect(skipped[0]?.reason).toMatch(/^Cannot read file: /);
        expect(skipped[1]?.reason).toMatch(/^Invalid JSON: /);
    });
});
