import { describe, it, expect } from 'vitest';
import { ElicitationAudit, formatExecutionSummary, toElicitationRecord } from '../../src/elicitation/audit.js';

const RESOLVED_AT = new Date('2026-03-04T05:06:07.000Z');

describe('ElicitationAudit', () => {
    it('records each handshake in order', async () => {
        const audit = new ElicitationAudit(() => RESOLVED_AT);
        const handler = audit.wrap(async request => (request.message === 'Name?'
            ? { action: 'accept', content: { name: 'Ada' } }
            : { action: 'decline', skippedFields: ['reason'] }));

        await handler({ message: 'Name?', requestedSchema: { type: 'object', properties: { name: { type: 'string' } } } });
        await handler({ message: 'Why?' });

        expect(audit.records).toEqual([
            {
                message:         'Name?',
                fields:          [{ name: 'name', type: 'string', required: false, description: '' }],
                collectedValues: { name: 'Ada' },
                skippedFields:   [],
                action:          'accept',
                timestamp:       '2026-03-04T05:06:07.000Z',
            },
            {
                message:         'Why?',
                fields:          [],
                collectedValues: {},
                skippedFields:   ['reason'],
                action:          'decline',
                timestamp:       '2026-03-04T05:06:07.000Z',
            },
        ]);
    });

    it('records a handler failure as cancel and rethrows', async () => {
        const audit = new ElicitationAudit(() => RESOLVED_AT);
        const handler = audit.wrap(async () => {
            throw new Error('terminal closed');
        });

        await expect(handler({ message: 'Name?' })).rejects.toThrow('terminal closed');
        expect(audit.records[0]?.action).toBe('cancel');
    });
});

describe('formatExecutionSummary', () => {
    it('is just the result when nothing was elicited', () => {
        expect(formatExecutionSummary([], 'Echo: hi')).toBe('Final Result:\nEcho: hi');
    });

    it('lists every elicitation before the result', () => {
        const records = [
            toElicitationRecord({ message: 'Name?' }, { action: 'accept', content: { name: 'Ada' } }, RESOLVED_AT),
            toElicitationRecord({ message: 'Continue?' }, { action: 'decline' }, RESOLVED_AT),
            toElicitationRecord({ message: 'Really?' }, { action: 'cancel' }, RESOLVED_AT),
        ];

        expect(formatExecutionSummary(records, 'Hello, Ada').split('\n')).toEqual([
            'Execution Summary:',
            '',
            'Elicitation #1:',
            '   Request: Name?',
            '   ✓ Response: {',
            '  "name": "Ada"',
            '} (accepted)',
            '',
            'Elicitation #2:',
            '   Request: Continue?',
            '   ✗ Response: (declined)',
            '',
            'Elicitation #3:',
            '   Request: Really?',
            '   ⊘ Response: (cancelled)',
            '',
            '─'.repeat(50),
            'Final Result:',
            'Hello, Ada',
        ]);
    });
});
