/**
 * Backend call execution
 *
 * Forwards one tool call, resource read or prompt get to a backend server:
 * - Opens a dedicated session through the ClientManager
 * - Answers backend `elicitation/create` requests through the caller's handler
 * - Logs timing and rethrows failures with the operation in the message
 * - Validates results against the protocol schemas
 */

import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import {
    CallToolResultSchema,
    ElicitResultSchema,
    GetPromptResultSchema,
    ReadResourceResultSchema,
    type CallToolResult,
    type ElicitRequest,
    type ElicitResult,
    type GetPromptResult,
    type ReadResourceResult
} from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ServerDescriptor } from '../types/server.js';
import type { ElicitationHandler, ElicitationOutcome, ElicitationRequest } from '../types/elicitation.js';
import type { ClientManager, SessionOptions } from './client-manager.js';

export const DEFAULT_CALL_TIMEOUT_MS = 60000;
export const DEFAULT_INTERACTIVE_TIMEOUT_MS = 60 * 60 * 1000;

/**
 * Executes forwarded calls. A backend that needs more input mid-call is
 * answered through `onElicit`; without one, such requests are refused by the
 * protocol layer.
 */
export interface TransportExecutor {
    invoke(server: ServerDescriptor, toolName: string, args: Record<string, unknown>, onElicit?: ElicitationHandler): Promise<CallToolResult>
    readResource(server: ServerDescriptor, uri: string, onElicit?: ElicitationHandler): Promise<ReadResourceResult>
    getPrompt(server: ServerDescriptor, promptName: string, args: Record<string, string>, onElicit?: ElicitationHandler): Promise<GetPromptResult>
}

export interface McpTransportExecutorOptions {
    /** Request timeout for calls without an elicitation handler */
    timeoutMs?:            number
    /** Request timeout for calls that may wait on the operator */
    interactiveTimeoutMs?: number
}

/**
 * Protocol elicitation request as a handshake request
 */
export function toElicitationRequest(request: ElicitRequest): ElicitationRequest {
    const { params } = request;
    const requestedSchema = 'requestedSchema' in params ? params.requestedSchema : undefined;
    return {
        message: params.message,
        ...(requestedSchema ? { requestedSchema } : {}),
    };
}

function isPrimitive(value: unknown): boolean {
    return _.isString(value) || _.isNumber(value) || _.isBoolean(value);
}

/**
 * Handshake outcome as a protocol elicitation result. Accepted values the
 * protocol cannot carry as-is are sent as JSON text.
 */
export function toElicitResult(outcome: ElicitationOutcome): ElicitResult {
    if(outcome.action !== 'accept') {
        return { action: outcome.action };
    }
    const direct = ElicitResultSchema.safeParse({ action: 'accept', content: outcome.content });
    if(direct.success) {
        return direct.data;
    }
    return ElicitResultSchema.parse({
        action:  'accept',
        content: _.mapValues(outcome.content, value => (isPrimitive(value) ? value : JSON.stringify(value))),
    });
}

/**
 * Protocol elicitation result as a handshake outcome
 */
export function fromElicitResult(result: ElicitResult): ElicitationOutcome {
    if(result.action === 'accept') {
        return { action: 'accept', content: { ...(result.content ?? {}) } };
    }
    return { action: result.action };
}

export class McpTransportExecutor implements TransportExecutor {
    private readonly timeoutMs: number;
    private readonly interactiveTimeoutMs: number;

    constructor(private readonly clientManager: ClientManager, options: McpTransportExecutorOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
        this.interactiveTimeoutMs = options.interactiveTimeoutMs ?? DEFAULT_INTERACTIVE_TIMEOUT_MS;
    }

    private sessionOptions(server: ServerDescriptor, onElicit: ElicitationHandler | undefined): SessionOptions {
        if(!onElicit) {
            return {};
        }
        return {
            onElicit: async (request) => {
                logger.info({ serverName: server.name, message: request.params.message }, 'Backend requested elicitation');
                return toElicitResult(await onElicit(toElicitationRequest(request)));
            },
        };
    }

    /**
     * Run one backend operation with consistent logging and error context
     */
    private async execute<T>(
        server: ServerDescriptor,
        operationType: string,
        identifier: string,
        onElicit: ElicitationHandler | undefined,
        run: (client: Client, timeout: number) => Promise<T>
    ): Promise<T> {
        const startTime = Date.now();
        const timeout = onElicit ? this.interactiveTimeoutMs : this.timeoutMs;

        logger.info({ serverName: server.name, identifier, timeout }, `Proxying ${operationType} to backend server`);

        try {
            const result = await this.clientManager.withSession(
                server,
                async client => run(client, timeout),
                this.sessionOptions(server, onElicit)
            );
            logger.info({ serverName: server.name, identifier, durationMs: Date.now() - startTime }, `${operationType} completed successfully`);
            return result;
        } catch (error) {
            logger.error(
                { serverName: server.name, identifier, durationMs: Date.now() - startTime, error: errorMessage(error) },
                `${operationType} failed`
            );
            throw new Error(`${operationType} ${server.name}.${identifier} failed: ${errorMessage(error)}`);
        }
    }

    async invoke(server: ServerDescriptor, toolName: string, args: Record<string, unknown>, onElicit?: ElicitationHandler): Promise<CallToolResult> {
        return this.execute(server, 'Tool call', toolName, onElicit, async (client, timeout) => CallToolResultSchema.parse(
            await client.callTool({ name: toolName, arguments: args }, CallToolResultSchema, { timeout })
        ));
    }

    async readResource(server: ServerDescriptor, uri: string, onElicit?: ElicitationHandler): Promise<ReadResourceResult> {
        return this.execute(server, 'Resource read', uri, onElicit, async (client, timeout) => ReadResourceResultSchema.parse(
            await client.readResource({ uri }, { timeout })
        ));
    }

    async getPrompt(server: ServerDescriptor, promptName: string, args: Record<string, string>, onElicit?: ElicitationHandler): Promise<GetPromptResult> {
        return this.execute(server, 'Prompt get', promptName, onElicit, async (client, timeout) => GetPromptResultSchema.parse(
            await client.getPrompt({ name: promptName, arguments: args }, { timeout })
        ));
    }
}
