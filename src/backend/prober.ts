/**
 * Capability probing
 *
 * Connects to one backend, lists its tools, resources and prompts, and
 * returns the descriptor in `connected` or `error` status.
 */

import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Tool, Resource, Prompt } from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { ProbeError, errorMessage } from '../utils/errors.js';
import {
    markError,
    type ServerDescriptor,
    type ToolDescriptor,
    type ToolParameter,
    type ResourceDescriptor,
    type PromptDescriptor
} from '../types/server.js';
import type { ClientManager } from './client-manager.js';
import { isRecord } from './validation.js';

/**
 * Given connection parameters, return the descriptor with status and
 * capabilities populated. Ordinary connection failures come back as an
 * `error` descriptor rather than a rejection.
 */
export interface CapabilityProber {
    /** `signal` aborts when the caller stops waiting; the probe then releases its session */
    probe(server: ServerDescriptor, signal?: AbortSignal): Promise<ServerDescriptor>
}

function schemaType(schema: Record<string, unknown>): string {
    const { type } = schema;
    if(_.isString(type)) {
        return type;
    }
    if(_.isArray(type)) {
        return _.filter(type, _.isString).join('|');
    }
    return 'any';
}

export function toToolDescriptor(tool: Tool): ToolDescriptor {
    const inputSchema: Record<string, unknown> = { ...tool.inputSchema };
    const properties = isRecord(inputSchema.properties) ? inputSchema.properties : {};
    const required = _.isArray(inputSchema.required) ? _.filter(inputSchema.required, _.isString) : [];

    const parameters = _.map(_.toPairs(properties), ([name, rawProperty]): ToolParameter => {
        const property = isRecord(rawProperty) ? rawProperty : {};
        return {
            name,
            type:     schemaType(property),
            required: _.includes(required, name),
            ...(_.isString(property.description) ? { description: property.description } : {}),
            ...('default' in property ? { default: property.default } : {}),
        };
    });

    return {
        name:        tool.name,
        inputSchema,
        parameters,
        ...(tool.description !== undefined ? { description: tool.description } : {}),
    };
}

export function toResourceDescriptor(resource: Resource): ResourceDescriptor {
    return {
        uri:  resource.uri,
        name: resource.name,
        ...(resource.description !== undefined ? { description: resource.description } : {}),
        ...(resource.mimeType !== undefined ? { mimeType: resource.mimeType } : {}),
    };
}

export function toPromptDescriptor(prompt: Prompt): PromptDescriptor {
    return {
        name:      prompt.name,
        arguments: _.map(prompt.arguments ?? [], argument => ({
            name:     argument.name,
            required: argument.required ?? false,
            ...(argument.description !== undefined ? { description: argument.description } : {}),
        })),
        ...(prompt.description !== undefined ? { description: prompt.description } : {}),
    };
}

/**
 * Human summary of a tool's parameters, e.g. `Required: a, b | Optional: c`
 */
export function parameterSummary(tool: ToolDescriptor): string {
    if(tool.parameters.length === 0) {
        return 'No parameters';
    }
    const [required, optional] = _.partition(tool.parameters, 'required');
    const parts: string[] = [];
    if(required.length > 0) {
        parts.push(`Required: ${_.map(required, 'name').join(', ')}`);
    }
    if(optional.length > 0) {
        parts.push(`Optional: ${_.map(optional, 'name').join(', ')}`);
    }
    return parts.join(' | ');
}

async function listAllPages<T>(fetchPage: (cursor?: string) => Promise<{ items: T[], nextCursor?: string }>): Promise<T[]> {
    const items: T[] = [];
    let cursor: string | undefined;
    do {
        const page = await fetchPage(cursor);
        items.push(...page.items);
        cursor = page.nextCursor;
    } while(cursor !== undefined);
    return items;
}

/**
 * Prober that talks MCP through the ClientManager
 */
export class McpCapabilityProber implements CapabilityProber {
    constructor(private readonly clientManager: ClientManager) {}

    /**
     * List one capability kind; a failing list is logged and left empty
     */
    private async listSafely<T>(serverName: string, itemType: string, advertised: boolean, list: () => Promise<T[]>): Promise<T[]> {
        if(!advertised) {
            return [];
        }
        try {
            return await list();
        } catch (error) {
            logger.warn({ serverName, error: errorMessage(error) }, `Failed to list ${itemType} from backend server`);
            return [];
        }
    }

    private async queryCapabilities(server: ServerDescriptor, client: Client): Promise<ServerDescriptor> {
        const capabilities = client.getServerCapabilities() ?? {};
        const serverVersion = client.getServerVersion();

        const [tools, resources, prompts] = await Promise.all([
            this.listSafely(server.name, 'tools', capabilities.tools !== undefined, async () => listAllPages(async (cursor) => {
                const result = await client.listTools(cursor !== undefined ? { cursor } : undefined);
                return { items: _.map(result.tools, toToolDescriptor), nextCursor: result.nextCursor };
            })),
            this.listSafely(server.name, 'resources', capabilities.resources !== undefined, async () => listAllPages(async (cursor) => {
                const result = await client.listResources(cursor !== undefined ? { cursor } : undefined);
                return { items: _.map(result.resources, toResourceDescriptor), nextCursor: result.nextCursor };
            })),
            this.listSafely(server.name, 'prompts', capabilities.prompts !== undefined, async () => listAllPages(async (cursor) => {
                const result = await client.listPrompts(cursor !== undefined ? { cursor } : undefined);
                return { items: _.map(result.prompts, toPromptDescriptor), nextCursor: result.nextCursor };
            })),
        ]);

        return {
            ..._.omit(server, 'errorMessage'),
            status: 'connected',
            tools,
            resources,
            prompts,
            ...(serverVersion ? { serverInfo: { name: serverVersion.name, version: serverVersion.version } } : {}),
        };
    }

    async probe(server: ServerDescriptor, signal?: AbortSignal): Promise<ServerDescriptor> {
        logger.info({ serverName: server.name, sourcePath: server.sourcePath }, 'Probing backend server');
        try {
            const probed = await this.clientManager.withSession(
                server,
                async client => this.queryCapabilities(server, client),
                signal ? { signal } : {}
            );
            logger.info(
                {
                    serverName:    server.name,
                    toolCount:     probed.tools.length,
                    resourceCount: probed.resources.length,
                    promptCount:   probed.prompts.length,
                },
                'Backend server probed'
            );
            return probed;
        } catch (error) {
            const probeError = new ProbeError(server.name, errorMessage(error));
            logger.warn({ serverName: server.name, error: probeError.message }, 'Backend server probe failed');
            return markError(server, probeError.message);
        }
    }
}
