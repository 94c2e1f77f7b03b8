/**
 * Proxy Control Plane
 *
 * Decides what the proxy forwards and carries each forwarded operation:
 * - Builds the forwarding set from the discovered servers and the allow-list
 * - Forwards tool calls, resource reads and prompt gets through a TransportExecutor
 * - Enforces the configured request rate
 * - Records operations and lifecycle events in the OperationLog when logging is on
 */

import _ from 'lodash';
import type { CallToolResult, GetPromptResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { RateLimitError, errorMessage } from '../utils/errors.js';
import type {
    ConfigSource,
    PromptDescriptor,
    ResourceDescriptor,
    ServerDescriptor,
    ToolDescriptor
} from '../types/server.js';
import type { ElicitationHandler } from '../types/elicitation.js';
import type { LogEntry } from '../types/log.js';
import type { EnablementStore } from '../enablement/store.js';
import type { OperationLog, OperationOutcome } from '../logging/operation-log.js';
import { ElicitationAudit } from '../elicitation/audit.js';
import { flattenSources } from './discovery.js';
import { TokenBucket } from './rate-limiter.js';
import type { TransportExecutor } from './executor.js';

export interface ForwardedTool {
    /** `<server>_<tool>` */
    readonly exposedName: string
    readonly server:      ServerDescriptor
    readonly tool:        ToolDescriptor
}

export interface ForwardedResource {
    readonly uri:      string
    readonly server:   ServerDescriptor
    readonly resource: ResourceDescriptor
}

export interface ForwardedPrompt {
    /** `<server>_<prompt>` */
    readonly exposedName: string
    readonly server:      ServerDescriptor
    readonly prompt:      PromptDescriptor
}

export interface ForwardingSet {
    readonly tools:     readonly ForwardedTool[]
    readonly resources: readonly ForwardedResource[]
    readonly prompts:   readonly ForwardedPrompt[]
}

export interface ProxyControlPlaneOptions {
    store:    EnablementStore
    log:      OperationLog
    executor: TransportExecutor
    /** Clock in milliseconds, replaceable in tests */
    now?:     () => number
}

/**
 * Name a capability is exposed under upstream
 */
export function exposedName(serverName: string, capabilityName: string): string {
    return `${serverName}_${capabilityName}`;
}

function declaredName(server: ServerDescriptor): string {
    return server.originalName ?? server.name;
}

/**
 * Keep the first entry for each key, logging the ones dropped
 */
function firstByKey<T>(items: readonly T[], keyOf: (item: T) => string, what: string): T[] {
    const seen = new Set<string>();
    return _.filter(items, (item) => {
        const key = keyOf(item);
        if(seen.has(key)) {
            logger.warn({ [what]: key }, `Duplicate ${what} not forwarded`);
            return false;
        }
        seen.add(key);
        return true;
    });
}

export class ProxyControlPlane {
    private sources: readonly ConfigSource[] = [];
    private bucket: TokenBucket | undefined;
    private readonly store: EnablementStore;
    private readonly log: OperationLog;
    private readonly executor: TransportExecutor;
    private readonly now: () => number;

    constructor(options: ProxyControlPlaneOptions) {
        this.store = options.store;
        this.log = options.log;
        this.executor = options.executor;
        this.now = options.now ?? Date.now;
    }

    /** Replace the discovery snapshot */
    setSources(sources: readonly ConfigSource[]): void {
        this.sources = [...sources];
    }

    /** The snapshot as a flat list, renamed the way discovery flattens it */
    get servers(): ServerDescriptor[] {
        return flattenSources(this.sources);
    }

    private get loggingOn(): boolean {
        return this.store.settings.loggingOn;
    }

    isServerForwarded(server: ServerDescriptor): boolean {
        return server.status === 'connected' && this.store.isServerEnabled(server.sourcePath, declaredName(server));
    }

    /**
     * What is currently forwarded: connected, enabled servers and their
     * allowed capabilities, in discovery order
     */
    buildForwardingSet(): ForwardingSet {
        const servers = _.filter(this.servers, server => this.isServerForwarded(server));
        const { store } = this;

        const tools = _.flatMap(servers, server => _.map(
            _.filter(server.tools, tool => store.isToolEnabled(server.sourcePath, declaredName(server), tool.name)),
            (tool): ForwardedTool => ({ exposedName: exposedName(server.name, tool.name), server, tool })
        ));
        const resources = _.flatMap(servers, server => _.map(
            _.filter(server.resources, resource => store.isResourceEnabled(server.sourcePath, declaredName(server), resource.uri)),
            (resource): ForwardedResource => ({ uri: resource.uri, server, resource })
        ));
        const prompts = _.flatMap(servers, server => _.map(
            _.filter(server.prompts, prompt => store.isPromptEnabled(server.sourcePath, declaredName(server), prompt.name)),
            (prompt): ForwardedPrompt => ({ exposedName: exposedName(server.name, prompt.name), server, prompt })
        ));

        return {
            tools:     firstByKey(tools, tool => tool.exposedName, 'tool'),
            resources: firstByKey(resources, resource => resource.uri, 'resource'),
            prompts:   firstByKey(prompts, prompt => prompt.exposedName, 'prompt'),
        };
    }

    private checkRate(): void {
        const { rateLimit } = this.store.settings;
        if(rateLimit === undefined) {
            this.bucket = undefined;
            return;
        }
        const bucket = this.bucket?.ratePerSecond === rateLimit
            ? this.bucket
            : new TokenBucket(rateLimit, undefined, this.now);
        this.bucket = bucket;
        if(!bucket.tryAcquire()) {
            throw new RateLimitError(rateLimit);
        }
    }

    /**
     * Rate-check, run, time and record one forwarded operation
     */
    private async forward<T>(
        run: (onElicit: ElicitationHandler | undefined) => Promise<T>,
        record: (outcome: OperationOutcome) => LogEntry,
        handler: ElicitationHandler | undefined
    ): Promise<T> {
        const audit = new ElicitationAudit();
        const onElicit = handler ? audit.wrap(handler) : undefined;
        const startTime = this.now();

        try {
            this.checkRate();
            const result = await run(onElicit);
            if(this.loggingOn) {
                record({ response: result, durationMs: this.now() - startTime, elicitations: audit.records });
            }
            return result;
        } catch (error) {
            if(this.loggingOn) {
                record({ error: errorMessage(error), durationMs: this.now() - startTime, elicitations: audit.records });
            }
            throw error;
        }
    }

    async callTool(name: string, args: Record<string, unknown> = {}, handler?: ElicitationHandler): Promise<CallToolResult> {
        const target = _.find(this.buildForwardingSet().tools, tool => tool.exposedName === name);
        if(!target) {
            throw new Error(`Unknown tool: ${name}`);
        }
        const { server, tool } = target;
        return this.forward(
            async onElicit => this.executor.invoke(server, tool.name, args, onElicit),
            outcome => this.log.recordToolCall(server.name, tool.name, args, outcome),
            handler
        );
    }

    async readResource(uri: string, handler?: ElicitationHandler): Promise<ReadResourceResult> {
        const target = _.find(this.buildForwardingSet().resources, resource => resource.uri === uri);
        if(!target) {
            throw new Error(`Unknown resource: ${uri}`);
        }
        const { server } = target;
        return this.forward(
            async onElicit => this.executor.readResource(server, uri, onElicit),
            outcome => this.log.recordResourceRead(server.name, uri, outcome),
            handler
        );
    }

    async getPrompt(name: string, args: Record<string, string> = {}, handler?: ElicitationHandler): Promise<GetPromptResult> {
        const target = _.find(this.buildForwardingSet().prompts, prompt => prompt.exposedName === name);
        if(!target) {
            throw new Error(`Unknown prompt: ${name}`);
        }
        const { server, prompt } = target;
        return this.forward(
            async onElicit => this.executor.getPrompt(server, prompt.name, args, onElicit),
            outcome => this.log.recordPromptGet(server.name, prompt.name, args, outcome),
            handler
        );
    }

    registerClient(clientId: string, remoteAddr?: string): void {
        logger.info({ clientId, remoteAddr }, 'Client connected');
        if(this.loggingOn) {
            this.log.recordClientConnected(clientId, remoteAddr);
        }
    }

    unregisterClient(clientId: string, reason?: string): void {
        logger.info({ clientId, reason }, 'Client disconnected');
        if(this.loggingOn) {
            this.log.recordClientDisconnected(clientId, reason);
        }
    }

    /**
     * Record the proxy start with the number of enabled servers, connected or not
     */
    recordStarted(message?: string): LogEntry {
        const { port } = this.store.settings;
        const enabled = _.filter(this.servers, server => this.store.isServerEnabled(server.sourcePath, declaredName(server))).length;
        logger.info({ port, enabledServers: enabled }, 'Proxy started');
        return this.log.recordServerStarted(port, enabled, message);
    }

    recordStopped(message?: string): LogEntry {
        logger.info('Proxy stopped');
        return this.log.recordServerStopped(message);
    }

    recordServerError(error: string, details: Record<string, unknown> = {}): LogEntry {
        logger.error({ error, ...details }, 'Proxy error');
        return this.log.recordServerError(error, details);
    }
}

export default ProxyControlPlane;
