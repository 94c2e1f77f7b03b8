/**
 * Tests for forwarding calls to a backend, including elicitation round trips
 */

import { describe, it, expect, vi } from 'vitest';
import { ElicitRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import {
    McpTransportExecutor,
    fromElicitResult,
    toElicitResult,
    toElicitationRequest
} from '../../src/backend/executor.js';
import type { ElicitationHandler } from '../../src/types/elicitation.js';
import { descriptor } from '../helpers/builders.js';
import { InMemoryClientManager, createStubBackend } from '../helpers/in-memory-backend.js';

describe('elicitation conversions', () => {
    it('reads a protocol request', () => {
        const request = ElicitRequestSchema.parse({
            method: 'elicitation/create',
            params: { message: 'Pick a port', requestedSchema: { type: 'object', properties: { port: { type: 'integer' } } } },
        });

        expect(toElicitationRequest(request)).toEqual({
            message:         'Pick a port',
            requestedSchema: { type: 'object', properties: { port: { type: 'integer' } } },
        });
    });

    it('sends values the protocol cannot carry as JSON text', () => {
        expect(toElicitResult({ action: 'accept', content: { port: 8080, options: { tls: true } } })).toEqual({
            action:  'accept',
            content: { port: 8080, options: '{"tls":true}' },
        });
    });

    it('drops the partial values of an aborted handshake', () => {
        expect(toElicitResult({ action: 'cancel', partial: { port: 8080 }, skippedFields: [] })).toEqual({ action: 'cancel' });
    });

    it('reads a protocol result', () => {
        expect(fromElicitResult({ action: 'accept' })).toEqual({ action: 'accept', content: {} });
        expect(fromElicitResult({ action: 'accept', content: { name: 'Ada' } })).toEqual({ action: 'accept', content: { name: 'Ada' } });
        expect(fromElicitResult({ action: 'decline' })).toEqual({ action: 'decline' });
    });
});

describe('McpTransportExecutor', () => {
    const stub = descriptor('stub');
    const manager = new InMemoryClientManager({ stub: createStubBackend });
    const executor = new McpTransportExecutor(manager);

    it('forwards a tool call', async () => {
        const result = await executor.invoke(stub, 'echo', { message: 'hi' });

        expect(result.content).toEqual([{ type: 'text', text: 'Echo: hi' }]);
        expect(manager.activeSessionCount()).toBe(0);
    });

    it('names the operation when the backend fails', async () => {
        await expect(executor.invoke(stub, 'fail', {})).rejects.toThrow(/^Tool call stub\.fail failed: .*Backend exploded/);
    });

    it('reads a resource', async () => {
        const result = await executor.readResource(stub, 'stub://readme');

        expect(result.contents).toEqual([{ uri: 'stub://readme', mimeType: 'text/plain', text: 'Read me' }]);
    });

    it('gets a prompt', async () => {
        const result = await executor.getPrompt(stub, 'greet', { who: 'Ada' });

        expect(result.messages).toEqual([{ role: 'user', content: { type: 'text', text: 'Hello Ada' } }]);
    });

    it('answers a backend elicitation through the handler', async () => {
        const handler = vi.fn<ElicitationHandler>(async () => ({ action: 'accept', content: { name: 'Ada' } }));

        const result = await executor.invoke(stub, 'ask_name', {}, handler);

        expect(result.content).toEqual([{ type: 'text', text: 'Hello, Ada' }]);
        expect(handler).toHaveBeenCalledWith({
            message:         'What is your name?',
            requestedSchema: {
                type:       'object',
                properties: { name: { type: 'string', description: 'Your name' } },
                required:   ['name'],
            },
        });
    });

    it('passes a declined elicitation back to the backend', async () => {
        const result = await executor.invoke(stub, 'ask_name', {}, async () => ({ action: 'decline' }));

        expect(result.content).toEqual([{ type: 'text', text: 'No name (decline)' }]);
    });

    it('fails a backend elicitation when no handler is given', async () => {
        await expect(executor.invoke(stub, 'ask_name', {})).rejects.toThrow(/^Tool call stub\.ask_name failed: /);
    });
});
