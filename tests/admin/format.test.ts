import { describe, it, expect } from 'vitest';
import { formatEntryLine, formatStats, formatTime, resultText, statusColor } from '../../src/admin/format.js';
import { toElicitationRecord } from '../../src/elicitation/audit.js';
import type { LogEntry } from '../../src/types/log.js';

const entry: LogEntry = {
    id:            'entry-1',
    timestamp:     '2026-03-04T12:00:01.250Z',
    kind:          'tool_call',
    serverName:    'files',
    operationName: 'read',
    parameters:    {},
};

describe('formatEntryLine', () => {
    it('shows time, status, kind, server and operation', () => {
        expect(formatEntryLine({ ...entry, error: 'boom' })).toBe('12:00:01 ERROR   tool_call files read');
        expect(formatEntryLine(entry)).toBe('12:00:01 PENDING tool_call files read');
    });

    it('adds the rounded duration and the elicitation count', () => {
        const asked = toElicitationRecord({ message: 'Sure?' }, { action: 'accept', content: {} }, new Date(0));

        expect(formatEntryLine({ ...entry, response: {}, durationMs: 12.4, elicitations: [asked] }))
            .toBe('12:00:01 SUCCESS tool_call files read (12ms) [1 elicitation]');
        expect(formatEntryLine({ ...entry, response: {}, elicitations: [asked, asked] }))
            .toBe('12:00:01 SUCCESS tool_call files read [2 elicitations]');
    });
});

describe('console helpers', () => {
    it('extracts the time of day', () => {
        expect(formatTime('2026-03-04T23:59:58.000Z')).toBe('23:59:58');
    });

    it('colors statuses', () => {
        expect([statusColor('SUCCESS'), statusColor('ERROR'), statusColor('PENDING')]).toEqual(['green', 'red', 'yellow']);
    });

    it('formats stats on one line', () => {
        expect(formatStats({ total: 4, successCount: 2, errorCount: 1, byServer: {}, byKind: {}, connectedClients: 1 }))
            .toBe('Total: 4 | Success: 2 | Errors: 1 | Clients: 1');
    });
});

describe('resultText', () => {
    it('joins text blocks and shows other blocks as JSON', () => {
        expect(resultText({
            content: [
                { type: 'text', text: 'first' },
                { type: 'image', data: 'AAAA', mimeType: 'image/png' },
            ],
        })).toBe('first\n{"type":"image","data":"AAAA","mimeType":"image/png"}');
    });

    it('marks error results', () => {
        expect(resultText({ content: [{ type: 'text', text: 'boom' }], isError: true })).toBe('Error: boom');
    });
});
