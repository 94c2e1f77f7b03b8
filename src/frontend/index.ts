/**
 * Frontend MCP Server Implementation
 *
 * This module is responsible for:
 * - Discovering backend servers and building the forwarding set
 * - Serving the forwarded tools, resources and prompts over stdio
 * - Passing backend elicitations up to the MCP client when it supports them
 * - Recording client and proxy lifecycle events in the operation log
 */

import _ from 'lodash';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ElicitRequestSchema,
    GetPromptRequestSchema,
    ListPromptsRequestSchema,
    ListPromptsResultSchema,
    ListResourcesRequestSchema,
    ListResourcesResultSchema,
    ListToolsRequestSchema,
    ListToolsResultSchema,
    ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ElicitationHandler } from '../types/elicitation.js';
import { fromElicitResult } from '../backend/executor.js';
import type { ProxyControlPlane } from '../backend/proxy.js';
import { openRuntime, type RuntimeOptions } from '../backend/runtime.js';

export const SERVER_INFO = {
    name:    'mcp-switchboard',
    version: '0.1.0',
};

/**
 * Elicitation callback that asks the connected MCP client
 */
function upstreamElicitation(server: Server): ElicitationHandler {
    return async (request) => {
        const { params } = ElicitRequestSchema.parse({
            method: 'elicitation/create',
            params: {
                message:         request.message,
                requestedSchema: { properties: {}, ...request.requestedSchema, type: 'object' },
            },
        });
        logger.info({ message: request.message }, 'Forwarding elicitation to client');
        return fromElicitResult(await server.elicitInput(params));
    };
}

/**
 * MCP server exposing the control plane's forwarding set. The set is rebuilt
 * on every request, so allow-list changes apply to the next call.
 */
export function createProxyServer(control: ProxyControlPlane): Server {
    const server = new Server(SERVER_INFO, {
        capabilities: {
            tools:     {},
            resources: {},
            prompts:   {},
        },
    });

    const elicitation = (): ElicitationHandler | undefined => (
        server.getClientCapabilities()?.elicitation ? upstreamElicitation(server) : undefined
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        const { tools } = control.buildForwardingSet();
        logger.debug({ toolCount: tools.length }, 'Handling tools/list request');
        return ListToolsResultSchema.parse({
            tools: _.map(tools, ({ exposedName, tool }) => ({
                name:        exposedName,
                description: tool.description,
                inputSchema: { ...tool.inputSchema, type: 'object' },
            })),
        });
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        logger.info({ toolName: name }, 'Handling tools/call request');
        return control.callTool(name, args ?? {}, elicitation());
    });

    server.setRequestHandler(ListResourcesRequestSchema, async () => {
        const { resources } = control.buildForwardingSet();
        logger.debug({ resourceCount: resources.length }, 'Handling resources/list request');
        return ListResourcesResultSchema.parse({
            resources: _.map(resources, ({ resource }) => ({ ...resource })),
        });
    });

    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
        const { uri } = request.params;
        logger.info({ uri }, 'Handling resources/read request');
        return control.readResource(uri, elicitation());
    });

    server.setRequestHandler(ListPromptsRequestSchema, async () => {
        const { prompts } = control.buildForwardingSet();
        logger.debug({ promptCount: prompts.length }, 'Handling prompts/list request');
        return ListPromptsResultSchema.parse({
            prompts: _.map(prompts, ({ exposedName, prompt }) => ({
                name:        exposedName,
                description: prompt.description,
                arguments:   _.map(prompt.arguments, argument => ({ ...argument })),
            })),
        });
    });

    server.setRequestHandler(GetPromptRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        logger.info({ name }, 'Handling prompts/get request');
        return control.getPrompt(name, args ?? {}, elicitation());
    });

    let clientId: string | undefined;
    server.oninitialized = () => {
        const client = server.getClientVersion();
        clientId = client ? `${client.name}@${client.version}` : 'unknown-client';
        control.registerClient(clientId, 'stdio');
    };
    server.onclose = () => {
        if(clientId !== undefined) {
            control.unregisterClient(clientId, 'connection closed');
            clientId = undefined;
        }
    };

    return server;
}

/**
 * Discover backends and serve the forwarding set over stdio until a signal
 * arrives
 */
export async function startServer(options: RuntimeOptions = {}): Promise<void> {
    logger.info('Starting MCP switchboard proxy');
    const runtime = await openRuntime(options);
    const { control, engine } = runtime;

    try {
        control.setSources(await engine.discoverHierarchical());
        const forwarding = control.buildForwardingSet();
        logger.info({
            toolCount:     forwarding.tools.length,
            resourceCount: forwarding.resources.length,
            promptCount:   forwarding.prompts.length,
        }, 'Forwarding set built');

        const server = createProxyServer(control);
        await server.connect(new StdioServerTransport());
        control.recordStarted();
        logger.info('MCP switchboard proxy started and connected');

        const shutdown = () => {
            logger.info('Shutting down MCP switchboard proxy');
            void (async () => {
                try {
                    control.recordStopped();
                    await server.close();
                    await runtime.close();
                    logger.info('MCP switchboard proxy shutdown complete');
                } catch (error) {
                    logger.error({ error: errorMessage(error) }, 'Error during shutdown');
                    process.exitCode = 1;
                }
            })();
        };

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
    } catch (error) {
        control.recordServerError(errorMessage(error), { phase: 'startup' });
        await runtime.close();
        logger.error({ error: errorMessage(error) }, 'Failed to start MCP switchboard proxy');
        throw error;
    }
}
