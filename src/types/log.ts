/**
 * Operation log model
 */

import type { ElicitationRecord } from './elicitation.js';

export const LogEntryKind = {
    ToolCall:           'tool_call',
    ResourceRead:       'resource_read',
    PromptGet:          'prompt_get',
    ServerStarted:      'server_started',
    ServerStopped:      'server_stopped',
    ServerError:        'server_error',
    ClientConnected:    'client_connected',
    ClientDisconnected: 'client_disconnected',
} as const;

export type LogEntryKind = typeof LogEntryKind[keyof typeof LogEntryKind];

export interface LogEntry {
    readonly id:            string
    /** ISO-8601 */
    readonly timestamp:     string
    readonly kind:          LogEntryKind
    readonly serverName:    string
    /** Tool name, resource URI, prompt name, or lifecycle verb */
    readonly operationName: string
    readonly parameters:    Readonly<Record<string, unknown>>
    readonly response?:     unknown
    readonly error?:        string
    readonly durationMs?:   number
    /** Handshakes that happened while this operation was in flight */
    readonly elicitations?: readonly ElicitationRecord[]
}

export type LogEntryStatus = 'SUCCESS' | 'ERROR' | 'PENDING';

export function entryStatus(entry: LogEntry): LogEntryStatus {
    if(entry.error) {
        return 'ERROR';
    }
    if(entry.response !== undefined && entry.response !== null) {
        return 'SUCCESS';
    }
    return 'PENDING';
}

export interface LogStats {
    total:            number
    successCount:     number
    errorCount:       number
    byServer:         Record<string, number>
    byKind:           Partial<Record<LogEntryKind, number>>
    connectedClients: number
}

/** Receives every entry right after it is appended */
export type LogSubscriber = (entry: LogEntry) => void;
