/**
 * Text formatting shared by the operator console and the CLI
 */

import _ from 'lodash';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { entryStatus, type LogEntry, type LogEntryStatus, type LogStats } from '../types/log.js';

export function statusColor(status: LogEntryStatus): 'green' | 'red' | 'yellow' {
    switch(status) {
        case 'SUCCESS':
            return 'green';
        case 'ERROR':
            return 'red';
        case 'PENDING':
            return 'yellow';
    }
}

/** HH:MM:SS of an ISO-8601 UTC timestamp */
export function formatTime(timestamp: string): string {
    return timestamp.slice(11, 19);
}

/**
 * One log entry as a single line, e.g.
 * `12:00:01 SUCCESS tool_call files read_file (12ms)`
 */
export function formatEntryLine(entry: LogEntry): string {
    const duration = entry.durationMs !== undefined ? ` (${Math.round(entry.durationMs)}ms)` : '';
    const elicitations = entry.elicitations && entry.elicitations.length > 0
        ? ` [${entry.elicitations.length} elicitation${entry.elicitations.length === 1 ? '' : 's'}]`
        : '';
    return `${formatTime(entry.timestamp)} ${_.padEnd(entryStatus(entry), 7)} ${entry.kind} ${entry.serverName} ${entry.operationName}${duration}${elicitations}`;
}

export function formatStats(stats: LogStats): string {
    return `Total: ${stats.total} | Success: ${stats.successCount} | Errors: ${stats.errorCount} | Clients: ${stats.connectedClients}`;
}

/**
 * Readable text of a tool result: text blocks as-is, anything else as JSON
 */
export function resultText(result: CallToolResult): string {
    const text = _.map(result.content, item => (item.type === 'text' ? item.text : JSON.stringify(item))).join('\n');
    return result.isError ? `Error: ${text}` : text;
}
