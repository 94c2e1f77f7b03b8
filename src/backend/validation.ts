/**
 * Server entry validation
 *
 * Turns one raw `mcpServers` entry into connection parameters, or into a
 * ServerValidationError whose message is shown on the error descriptor.
 */

import _ from 'lodash';
import type { ZodError } from 'zod';
import {
    SERVER_KINDS,
    StdioServerEntrySchema,
    HttpServerEntrySchema,
    SseServerEntrySchema
} from '../types/config.js';
import type { ConnectionParams, ServerKind } from '../types/server.js';
import { ServerValidationError } from '../utils/errors.js';

export interface ValidEntry {
    readonly ok:           true
    readonly name:         string
    readonly connection:   ConnectionParams
    readonly description?: string
}

export interface InvalidEntry {
    readonly ok:         false
    readonly name:       string
    /** Best-effort connection parameters so the error descriptor still shows what was declared */
    readonly connection: ConnectionParams
    readonly error:      ServerValidationError
}

export type EntryValidation = ValidEntry | InvalidEntry;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return _.isPlainObject(value);
}

function isServerKind(value: unknown): value is ServerKind {
    return _.some(SERVER_KINDS, kind => kind === value);
}

function stringRecord(value: unknown): Record<string, string> {
    if(!isRecord(value)) {
        return {};
    }
    return _.mapValues(_.pickBy(value, v => _.isString(v) || _.isNumber(v) || _.isBoolean(v)), v => String(v));
}

/**
 * Connection parameters read leniently from an entry that failed validation
 */
function fallbackConnection(kind: ServerKind, raw: Record<string, unknown>): ConnectionParams {
    if(kind === 'stdio') {
        return {
            kind,
            command: _.isString(raw.command) ? raw.command : '',
            args:    _.isArray(raw.args) ? _.filter(raw.args, _.isString) : [],
            env:     stringRecord(raw.env),
        };
    }
    return {
        kind,
        url:     _.isString(raw.url) ? raw.url : '',
        headers: stringRecord(raw.headers),
    };
}

function firstIssue(error: ZodError): string {
    return error.issues[0]?.message ?? 'Invalid server entry';
}

function invalid(name: string, connection: ConnectionParams, message: string): InvalidEntry {
    return { ok: false, name, connection, error: new ServerValidationError(name, message) };
}

/**
 * Validate one server entry by its declared kind
 */
export function validateServerEntry(serverName: string, rawEntry: unknown): EntryValidation {
    if(!isRecord(rawEntry)) {
        return invalid(serverName, fallbackConnection('stdio', {}), 'Server entry must be an object');
    }

    const declaredType = rawEntry.type ?? 'stdio';
    if(!isServerKind(declaredType)) {
        return invalid(serverName, fallbackConnection('stdio', rawEntry), `Invalid server type: ${String(declaredType)}`);
    }

    if(declaredType === 'stdio') {
        const parsed = StdioServerEntrySchema.safeParse(rawEntry);
        if(!parsed.success) {
            return invalid(serverName, fallbackConnection(declaredType, rawEntry), firstIssue(parsed.error));
        }
        const entry = parsed.data;
        return {
            ok:          true,
            name:        serverName,
            connection:  {
                kind:    'stdio',
                command: entry.command,
                args:    entry.args ?? [],
                env:     entry.env ?? {},
                ...(entry.cwd !== undefined ? { cwd: entry.cwd } : {}),
            },
            ...(entry.description !== undefined ? { description: entry.description } : {}),
        };
    }

    const parsed = (declaredType === 'http' ? HttpServerEntrySchema : SseServerEntrySchema).safeParse(rawEntry);
    if(!parsed.success) {
        return invalid(serverName, fallbackConnection(declaredType, rawEntry), firstIssue(parsed.error));
    }
    const entry = parsed.data;
    return {
        ok:          true,
        name:        serverName,
        connection:  {
            kind:    declaredType,
            url:     entry.url,
            headers: entry.headers ?? {},
        },
        ...(entry.description !== undefined ? { description: entry.description } : {}),
    };
}
