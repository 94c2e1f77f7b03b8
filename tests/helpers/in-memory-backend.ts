/**
 * In-process MCP backends for tests
 *
 * `createStubBackend()` builds a small MCP server; `InMemoryClientManager`
 * connects sessions to such servers over linked in-memory transports instead
 * of spawning processes.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
    CallToolRequestSchema,
    GetPromptRequestSchema,
    ListPromptsRequestSchema,
    ListResourcesRequestSchema,
    ListToolsRequestSchema,
    ReadResourceRequestSchema,
    type CallToolResult,
    type GetPromptResult,
    type ListToolsResult,
    type ReadResourceResult
} from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { ClientManager, type SessionOptions } from '../../src/backend/client-manager.js';
import type { ServerDescriptor } from '../../src/types/server.js';

export const STUB_RESOURCE_URI = 'stub://readme';

function text(value: string): CallToolResult {
    return { content: [{ type: 'text', text: value }] };
}

/**
 * Backend with tools `echo`, `fail` and `ask_name`, resource `stub://readme`
 * and prompt `greet`
 */
export function createStubBackend(): Server {
    const server = new Server(
        { name: 'stub-backend', version: '1.0.0' },
        { capabilities: { tools: {}, resources: {}, prompts: {} } }
    );

    server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => ({
        tools: [
            {
                name:        'echo',
                description: 'Echoes a message',
                inputSchema: {
                    type:       'object',
                    properties: { message: { type: 'string', description: 'Message to echo back' } },
                    required:   ['message'],
                },
            },
            { name: 'fail', description: 'Always fails', inputSchema: { type: 'object', properties: {} } },
            { name: 'ask_name', description: 'Asks for a name', inputSchema: { type: 'object', properties: {} } },
        ],
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
        const { name, arguments: args } = request.params;
        switch(name) {
            case 'echo': {
                const message = args?.message;
                return text(`Echo: ${_.isString(message) ? message : ''}`);
            }
            case 'fail':
                throw new Error('Backend exploded');
            case 'ask_name': {
                const answer = await server.elicitInput({
                    message:         'What is your name?',
                    requestedSchema: {
                        type:       'object',
                        properties: { name: { type: 'string', description: 'Your name' } },
                        required:   ['name'],
                    },
                });
                const provided = answer.content?.name;
                return answer.action === 'accept' && _.isString(provided)
                    ? text(`Hello, ${provided}`)
                    : text(`No name (${answer.action})`);
            }
            default:
                throw new Error(`Unknown tool: ${name}`);
        }
    });

    server.setRequestHandler(ListResourcesRequestSchema, async () => ({
        resources: [{ uri: STUB_RESOURCE_URI, name: 'readme', mimeType: 'text/plain' }],
    }));

    server.setRequestHandler(ReadResourceRequestSchema, async (request): Promise<ReadResourceResult> => {
        if(request.params.uri !== STUB_RESOURCE_URI) {
            throw new Error(`Unknown resource: ${request.params.uri}`);
        }
        return { contents: [{ uri: STUB_RESOURCE_URI, mimeType: 'text/plain', text: 'Read me' }] };
    });

    server.setRequestHandler(ListPromptsRequestSchema, async () => ({
        prompts: [{ name: 'greet', description: 'Greets someone', arguments: [{ name: 'who', required: true }] }],
    }));

    server.setRequestHandler(GetPromptRequestSchema, async (request): Promise<GetPromptResult> => {
        const who = request.params.arguments?.who ?? 'nobody';
        return { messages: [{ role: 'user', content: { type: 'text', text: `Hello ${who}` } }] };
    });

    return server;
}

/**
 * Backend that only advertises tools, with a single `ping` tool
 */
export function createToolsOnlyBackend(): Server {
    const server = new Server({ name: 'tools-only', version: '2.0.0' }, { capabilities: { tools: {} } });
    server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => ({
        tools: [{ name: 'ping', inputSchema: { type: 'object', properties: {} } }],
    }));
    server.setRequestHandler(CallToolRequestSchema, async () => text('pong'));
    return server;
}

/**
 * ClientManager whose sessions reach in-process servers, looked up by the
 * descriptor's declared name
 */
export class InMemoryClientManager extends ClientManager {
    private pending: Transport | undefined;
    /** Server names, one per session opened */
    readonly connections: string[] = [];

    constructor(private readonly backends: Record<string, () => Server>) {
        super();
    }

    protected override async attemptConnection(descriptor: ServerDescriptor, options: SessionOptions): Promise<Client> {
        const factory = _.get(this.backends, descriptor.originalName ?? descriptor.name);
        if(!factory) {
            throw new Error(`Connection refused: ${descriptor.name}`);
        }
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await factory().connect(serverTransport);
        this.pending = clientTransport;
        this.connections.push(descriptor.name);
        return super.attemptConnection(descriptor, options);
    }

    protected override createTransport(): Transport {
        const transport = this.pending;
        this.pending = undefined;
        if(!transport) {
            throw new Error('No in-memory transport prepared');
        }
        return transport;
    }
}
