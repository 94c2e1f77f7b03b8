/**
 * Unit tests for server entry validation
 */

import { describe, it, expect } from 'vitest';
import { validateServerEntry } from '../../src/backend/validation.js';
import { ServerValidationError } from '../../src/utils/errors.js';

function errorOf(name: string, raw: unknown): string {
    const result = validateServerEntry(name, raw);
    if(result.ok) {
        throw new Error(`Expected ${name} to be invalid`);
    }
    return result.error.message;
}

describe('validateServerEntry', () => {
    describe('stdio entries', () => {
        it('treats an entry without type as stdio', () => {
            const result = validateServerEntry('files', { command: 'npx', args: ['-y', 'files-server'] });

            expect(result).toEqual({
                ok:         true,
                name:       'files',
                connection: { kind: 'stdio', command: 'npx', args: ['-y', 'files-server'], env: {} },
            });
        });

        it('stringifies numeric and boolean env values', () => {
            const result = validateServerEntry('api', { type: 'stdio', command: 'node', env: { PORT: 8080, DEBUG: true, NAME: 'x' } });

            expect(result.ok && result.connection).toEqual({
                kind:    'stdio',
                command: 'node',
                args:    [],
                env:     { PORT: '8080', DEBUG: 'true', NAME: 'x' },
            });
        });

        it('keeps cwd and description', () => {
            const result = validateServerEntry('local', { command: 'node', cwd: '/srv', description: 'Local tools' });

            expect(result).toEqual({
                ok:          true,
                name:        'local',
                connection:  { kind: 'stdio', command: 'node', args: [], env: {}, cwd: '/srv' },
                description: 'Local tools',
            });
        });

        it('requires a command', () => {
            expect(errorOf('a', {})).toBe("stdio server must have 'command' field");
        });

        it('rejects an empty command', () => {
            expect(errorOf('a', { command: '' })).toBe('No command specified in configuration');
        });

        it('rejects args that are not a list', () => {
            expect(errorOf('a', { command: 'node', args: 'server.js' })).toBe("'args' must be a list");
        });

        it('rejects env that is not an object', () => {
            expect(errorOf('a', { command: 'node', env: ['A=1'] })).toBe("'env' must be an object");
        });
    });

    describe('remote entries', () => {
        it('accepts an http entry', () => {
            const result = validateServerEntry('remote', { type: 'http', url: 'https://example.test/mcp', headers: { Authorization: 'Bearer test-token' } });

            expect(result).toEqual({
                ok:         true,
                name:       'remote',
                connection: { kind: 'http', url: 'https://example.test/mcp', headers: { Authorization: 'Bearer test-token' } },
            });
        });

        it('accepts an sse entry without headers', () => {
            const result = validateServerEntry('events', { type: 'sse', url: 'https://example.test/sse' });

            expect(result.ok && result.connection).toEqual({ kind: 'sse', url: 'https://example.test/sse', headers: {} });
        });

        it('requires a url', () => {
            expect(errorOf('remote', { type: 'http' })).toBe("http server must have 'url' field");
            expect(errorOf('remote', { type: 'sse' })).toBe("sse server must have 'url' field");
        });

        it('rejects an empty url', () => {
            expect(errorOf('remote', { type: 'sse', url: '' })).toBe('No URL specified in configuration');
        });

        it('rejects headers that are not an object', () => {
            expect(errorOf('remote', { type: 'http', url: 'https://example.test', headers: 'x' })).toBe("'headers' must be an object");
        });
    });

    describe('malformed entries', () => {
        it('rejects a non-object entry', () => {
            const result = validateServerEntry('broken', 'node server.js');

            expect(result.ok).toBe(false);
            if(!result.ok) {
                expect(result.error).toBeInstanceOf(ServerValidationError);
                expect(result.error.serverName).toBe('broken');
                expect(result.error.message).toBe('Server entry must be an object');
                expect(result.connection).toEqual({ kind: 'stdio', command: '', args: [], env: {} });
            }
        });

        it('rejects an unknown type and keeps what was declared', () => {
            const result = validateServerEntry('ws', { type: 'websocket', command: 'node', args: ['ws.js', 3] });

            expect(result.ok).toBe(false);
            if(!result.ok) {
                expect(result.error.message).toBe('Invalid server type: websocket');
                expect(result.connection).toEqual({ kind: 'stdio', command: 'node', args: ['ws.js'], env: {} });
            }
        });

        it('keeps the declared url on an invalid remote entry', () => {
            const result = validateServerEntry('remote', { type: 'http', url: 'https://example.test', headers: [] });

            expect(result.ok).toBe(false);
            if(!result.ok) {
                expect(result.connection).toEqual({ kind: 'http', url: 'https://example.test', headers: {} });
            }
        });
    });
});
