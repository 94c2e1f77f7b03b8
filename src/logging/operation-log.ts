/**
 * Operation Log
 *
 * Bounded, observable record of every proxied operation and proxy lifecycle
 * event. Recording an entry appends it (evicting the oldest past capacity),
 * hands it to the persistence sink, then notifies subscribers in order.
 * A sink or subscriber that throws is logged and skipped.
 *
 * The log is also the only source for the connected-client count, which is
 * replayed from the retained entries and can undercount once a connect event
 * has been evicted.
 */

import { randomUUID } from 'node:crypto';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { SubscriberError, errorMessage } from '../utils/errors.js';
import {
    LogEntryKind,
    entryStatus,
    type LogEntry,
    type LogStats,
    type LogSubscriber
} from '../types/log.js';
import type { ElicitationRecord } from '../types/elicitation.js';
import type { LogSink } from './file-sink.js';

export const DEFAULT_MAX_LOG_ENTRIES = 1000;

/** serverName used for lifecycle entries */
export const PROXY_SERVER_NAME = 'proxy';

export interface OperationLogOptions {
    maxEntries?: number
    sink?:       LogSink
    /** Clock, replaceable in tests */
    now?:        () => Date
}

/** How a forwarded operation ended */
export interface OperationOutcome {
    response?:     unknown
    error?:        string
    durationMs?:   number
    elicitations?: readonly ElicitationRecord[]
}

export interface LogQuery {
    serverName?: string
    kind?:       LogEntryKind
    /** Case-insensitive match on operation name, parameters or response */
    searchText?: string
}

function searchableText(value: unknown): string {
    try {
        return JSON.stringify(value) ?? '';
    } catch{
        return String(value);
    }
}

function clientIdOf(entry: LogEntry): string | undefined {
    const { clientId } = entry.parameters;
    return _.isString(clientId) && clientId !== '' ? clientId : undefined;
}

function checkCapacity(maxEntries: number): number {
    if(!Number.isInteger(maxEntries) || maxEntries < 1) {
        throw new RangeError(`Log capacity must be a positive integer, got ${maxEntries}`);
    }
    return maxEntries;
}

export class OperationLog {
    private buffer: LogEntry[] = [];
    private subscribers: LogSubscriber[] = [];
    private maxEntries: number;
    private readonly sink: LogSink | undefined;
    private readonly now: () => Date;

    constructor(options: OperationLogOptions = {}) {
        this.maxEntries = checkCapacity(options.maxEntries ?? DEFAULT_MAX_LOG_ENTRIES);
        this.sink = options.sink;
        this.now = options.now ?? (() => new Date());
    }

    get capacity(): number {
        return this.maxEntries;
    }

    /**
     * Change the capacity, evicting the oldest entries if now over it
     *
     * @throws RangeError unless `maxEntries` is a positive integer
     */
    setCapacity(maxEntries: number): void {
        this.maxEntries = checkCapacity(maxEntries);
        this.trim();
    }

    /** Retained entries, oldest first */
    get entries(): readonly LogEntry[] {
        return [...this.buffer];
    }

    private trim(): void {
        if(this.buffer.length > this.maxEntries) {
            this.buffer = this.buffer.slice(-this.maxEntries);
        }
    }

    private notify(entry: LogEntry): void {
        for(const subscriber of [...this.subscribers]) {
            try {
                subscriber(entry);
            } catch (error) {
                const subscriberError = new SubscriberError(`Log subscriber failed: ${errorMessage(error)}`, error);
                logger.warn({ entryId: entry.id, error: subscriberError.message }, 'Log subscriber threw');
            }
        }
    }

    private append(fields: Omit<LogEntry, 'id' | 'timestamp'>): LogEntry {
        const entry: LogEntry = {
            id:        randomUUID(),
            timestamp: this.now().toISOString(),
            ...fields,
        };

        this.buffer.push(entry);
        this.trim();
        if(this.sink) {
            try {
                this.sink.append(entry);
            } catch (error) {
                logger.warn({ entryId: entry.id, error: errorMessage(error) }, 'Log sink failed');
            }
        }
        this.notify(entry);
        return entry;
    }

    /**
     * Append previously recorded entries as they are, e.g. read back from a
     * persisted log. They are not handed to the sink again.
     */
    replay(entries: readonly LogEntry[]): void {
        for(const entry of entries) {
            this.buffer.push(entry);
            this.trim();
            this.notify(entry);
        }
    }

    private recordOperation(
        kind: LogEntryKind,
        serverName: string,
        operationName: string,
        parameters: Record<string, unknown>,
        outcome: OperationOutcome
    ): LogEntry {
        // Entries never change after creation, so nothing the caller keeps may alias them
        return this.append({
            kind,
            serverName,
            operationName,
            parameters: _.cloneDeep(parameters),
            ...(outcome.response !== undefined ? { response: _.cloneDeep(outcome.response) } : {}),
            ...(outcome.error !== undefined ? { error: outcome.error } : {}),
            ...(outcome.durationMs !== undefined ? { durationMs: outcome.durationMs } : {}),
            ...(outcome.elicitations !== undefined && outcome.elicitations.length > 0 ? { elicitations: _.cloneDeep(outcome.elicitations) } : {}),
        });
    }

    recordToolCall(serverName: string, toolName: string, parameters: Record<string, unknown>, outcome: OperationOutcome = {}): LogEntry {
        return this.recordOperation(LogEntryKind.ToolCall, serverName, toolName, parameters, outcome);
    }

    recordResourceRead(serverName: string, resourceUri: string, outcome: OperationOutcome = {}): LogEntry {
        return this.recordOperation(LogEntryKind.ResourceRead, serverName, resourceUri, {}, outcome);
    }

    recordPromptGet(serverName: string, promptName: string, parameters: Record<string, unknown>, outcome: OperationOutcome = {}): LogEntry {
        return this.recordOperation(LogEntryKind.PromptGet, serverName, promptName, parameters, outcome);
    }

    recordServerStarted(port: number, enabledServers: number, message?: string): LogEntry {
        return this.append({
            kind:          LogEntryKind.ServerStarted,
            serverName:    PROXY_SERVER_NAME,
            operationName: 'start',
            parameters:    { port, enabledServers },
            response:      message ?? `Proxy server started on port ${port}`,
        });
    }

    recordServerStopped(message?: string): LogEntry {
        return this.append({
            kind:          LogEntryKind.ServerStopped,
            serverName:    PROXY_SERVER_NAME,
            operationName: 'stop',
            parameters:    {},
            response:      message ?? 'Proxy server stopped',
        });
    }

    recordServerError(error: string, details: Record<string, unknown> = {}): LogEntry {
        return this.append({
            kind:          LogEntryKind.ServerError,
            serverName:    PROXY_SERVER_NAME,
            operationName: 'error',
            parameters:    _.cloneDeep(details),
            error,
        });
    }

    recordClientConnected(clientId: string, remoteAddr = 'unknown'): LogEntry {
        return this.append({
            kind:          LogEntryKind.ClientConnected,
            serverName:    PROXY_SERVER_NAME,
            operationName: 'client_connect',
            parameters:    { clientId, remoteAddr },
            response:      `Client ${clientId} connected from ${remoteAddr}`,
        });
    }

    recordClientDisconnected(clientId: string, reason = 'normal'): LogEntry {
        return this.append({
            kind:          LogEntryKind.ClientDisconnected,
            serverName:    PROXY_SERVER_NAME,
            operationName: 'client_disconnect',
            parameters:    { clientId, reason },
            response:      `Client ${clientId} disconnected: ${reason}`,
        });
    }

    /**
     * Retained entries matching every given filter, oldest first
     */
    query(filter: LogQuery = {}): LogEntry[] {
        const { serverName, kind, searchText } = filter;
        const needle = searchText ? searchText.toLowerCase() : undefined;

        return _.filter(this.buffer, (entry) => {
            if(serverName && entry.serverName !== serverName) {
                return false;
            }
            if(kind && entry.kind !== kind) {
                return false;
            }
            if(needle === undefined) {
                return true;
            }
            return entry.operationName.toLowerCase().includes(needle)
                || searchableText(entry.parameters).toLowerCase().includes(needle)
                || (entry.response !== undefined && entry.response !== null
                    && searchableText(entry.response).toLowerCase().includes(needle));
        });
    }

    /**
     * Client ids connected according to the retained entries, replayed in order
     */
    connectedClientIds(): string[] {
        const connected = new Set<string>();
        for(const entry of this.buffer) {
            const clientId = clientIdOf(entry);
            if(clientId === undefined) {
                continue;
            }
            if(entry.kind === LogEntryKind.ClientConnected) {
                connected.add(clientId);
            } else if(entry.kind === LogEntryKind.ClientDisconnected) {
                connected.delete(clientId);
            }
        }
        return Array.from(connected);
    }

    /**
     * Success and error counts are not complements of `total`: an entry with
     * neither response nor error is pending.
     */
    stats(): LogStats {
        const byKind: Partial<Record<LogEntryKind, number>> = {};
        for(const entry of this.buffer) {
            byKind[entry.kind] = (byKind[entry.kind] ?? 0) + 1;
        }

        return {
            total:            this.buffer.length,
            successCount:     _.filter(this.buffer, entry => entryStatus(entry) === 'SUCCESS').length,
            errorCount:       _.filter(this.buffer, entry => entryStatus(entry) === 'ERROR').length,
            byServer:         _.countBy(this.buffer, 'serverName'),
            byKind,
            connectedClients: this.connectedClientIds().length,
        };
    }

    /**
     * @returns a function that removes the subscription
     */
    subscribe(subscriber: LogSubscriber): () => void {
        this.subscribers.push(subscriber);
        return () => this.unsubscribe(subscriber);
    }

    unsubscribe(subscriber: LogSubscriber): void {
        const index = this.subscribers.indexOf(subscriber);
        if(index !== -1) {
            this.subscribers.splice(index, 1);
        }
    }

    clear(): void {
        this.buffer = [];
    }
}
