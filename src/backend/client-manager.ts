/**
 * MCP Client Manager
 *
 * Owns every open backend session:
 * - Creates a transport for the descriptor's kind (stdio, streamable HTTP, SSE)
 * - Connects an MCP Client and runs the caller's work against it
 * - Removes and closes the session on the same control path that opened it
 *
 * Sessions are keyed by the composite server key plus a sequence number, so
 * two concurrent calls to the same backend hold two distinct entries.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ElicitRequestSchema, type ElicitRequest, type ElicitResult } from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { errorMessage } from '../utils/errors.js';
import { serverKeyOf, type ServerDescriptor } from '../types/server.js';

export const CLIENT_INFO = {
    name:    'mcp-switchboard',
    version: '0.1.0',
} as const;

export interface SessionOptions {
    /** Answers `elicitation/create` requests the backend sends mid-call */
    onElicit?: (request: ElicitRequest) => Promise<ElicitResult>
    /** Closes the session (or abandons the connect) when aborted */
    signal?:   AbortSignal
}

interface ActiveSession {
    serverKey: string
    client:    Client
    openedAt:  number
}

/**
 * Manages MCP client sessions to backend servers
 */
export class ClientManager {
    private sessions = new Map<string, ActiveSession>();
    private sequence = 0;

    /**
     * Build the transport for one descriptor. Overridden by tests to connect
     * to in-process servers.
     */
    protected createTransport(descriptor: ServerDescriptor): Transport {
        const { connection } = descriptor;
        switch(connection.kind) {
            case 'stdio':
                return new StdioClientTransport({
                    command: connection.command,
                    args:    [...connection.args],
                    env:     {
                        ...getDefaultEnvironment(),
                        ...connection.env,
                        // Propagate quiet mode to backend servers
                        ...(process.env.LOG_LEVEL ? { LOG_LEVEL: process.env.LOG_LEVEL } : {}),
                    },
                    ...(connection.cwd !== undefined ? { cwd: connection.cwd } : {}),
                    // The operator console owns the terminal; serve mode inherits stderr for debugging
                    stderr: process.env.CONSOLE_MODE === 'true' || process.env.LOG_LEVEL === 'silent' ? 'ignore' : 'inherit',
                });
            case 'http':
                return new StreamableHTTPClientTransport(new URL(connection.url), {
                    requestInit: { headers: { ...connection.headers } },
                });
            case 'sse':
                return new SSEClientTransport(new URL(connection.url), {
                    requestInit: { headers: { ...connection.headers } },
                });
        }
    }

    /**
     * Open one connected client (single attempt, no retries)
     */
    protected async attemptConnection(descriptor: ServerDescriptor, options: SessionOptions): Promise<Client> {
        logger.debug({ serverName: descriptor.name, kind: descriptor.kind }, 'Attempting connection to backend server');

        const client = new Client(CLIENT_INFO, {
            capabilities: options.onElicit ? { elicitation: {} } : {},
        });

        const { onElicit } = options;
        if(onElicit) {
            client.setRequestHandler(ElicitRequestSchema, async request => onElicit(request));
        }

        client.onerror = (error: Error) => {
            logger.error({ serverName: descriptor.name, error: error.message }, 'Backend server connection error');
        };

        await client.connect(this.createTransport(descriptor), options.signal ? { signal: options.signal } : undefined);
        return client;
    }

    /**
     * Run `work` against a freshly connected session, closing it afterwards
     * whether the work succeeds or throws
     */
    async withSession<T>(
        descriptor: ServerDescriptor,
        work: (client: Client) => Promise<T>,
        options: SessionOptions = {}
    ): Promise<T> {
        const serverKey = serverKeyOf(descriptor);
        const sessionId = `${serverKey}#${++this.sequence}`;
        const { signal } = options;

        if(signal?.aborted) {
            throw new Error(`Session to ${serverKey} aborted`);
        }
        const client = await this.attemptConnection(descriptor, options);
        if(signal?.aborted) {
            await this.closeClient(serverKey, client);
            throw new Error(`Session to ${serverKey} aborted`);
        }
        this.sessions.set(sessionId, { serverKey, client, openedAt: Date.now() });
        logger.debug({ serverKey, sessionId, activeSessions: this.sessions.size }, 'Backend session opened');

        const abandon = () => {
            if(this.sessions.delete(sessionId)) {
                logger.info({ serverKey, sessionId }, 'Backend session aborted');
                void this.closeClient(serverKey, client);
            }
        };
        signal?.addEventListener('abort', abandon, { once: true });

        try {
            return await work(client);
        } finally {
            signal?.removeEventListener('abort', abandon);
            // A session already taken by closeAll() or an abort is closed there
            if(this.sessions.delete(sessionId)) {
                await this.closeClient(serverKey, client);
            }
        }
    }

    /**
     * Number of open sessions, overall or for one composite server key
     */
    activeSessionCount(serverKey?: string): number {
        if(serverKey === undefined) {
            return this.sessions.size;
        }
        return _.filter(Array.from(this.sessions.values()), session => session.serverKey === serverKey).length;
    }

    /**
     * Close every open session
     */
    async closeAll(): Promise<void> {
        const open = Array.from(this.sessions.values());
        this.sessions.clear();

        logger.info({ sessionCount: open.length }, 'Closing all backend sessions');
        await Promise.all(_.map(open, async session => this.closeClient(session.serverKey, session.client)));
    }

    private async closeClient(serverKey: string, client: Client): Promise<void> {
        try {
            await client.close();
        } catch (error) {
            logger.warn({ serverKey, error: errorMessage(error) }, 'Error closing backend session');
        }
    }
}

export default ClientManager;
