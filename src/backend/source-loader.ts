/**
 * Configuration source loading
 *
 * Reads each configured location and extracts its raw server map. A location
 * that cannot be read or parsed is skipped with a reason; the rest load.
 */

import { readFile } from 'node:fs/promises';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { SourceParseError, errorMessage } from '../utils/errors.js';
import { isRecord } from './validation.js';

export interface RawServerEntry {
    readonly name: string
    readonly raw:  unknown
}

/** One parsed location, before validation */
export interface RawSource {
    readonly path:    string
    readonly entries: readonly RawServerEntry[]
}

export interface SkippedSource {
    readonly path:   string
    readonly reason: string
}

export interface SourceLoadResult {
    readonly sources: readonly RawSource[]
    readonly skipped: readonly SkippedSource[]
}

/**
 * Locate the server map: `mcpServers`, then `servers`, then the document itself
 */
export function extractServerMap(document: Record<string, unknown>): unknown {
    if('mcpServers' in document) {
        return document.mcpServers;
    }
    if('servers' in document) {
        return document.servers;
    }
    return document;
}

/**
 * Parse one source document. Duplicate keys inside the document resolve
 * last-write-wins during JSON parsing, so entry names are unique per source.
 */
export function parseSource(path: string, content: string): RawSource {
    let document: unknown;
    try {
        document = JSON.parse(content);
    } catch (error) {
        throw new SourceParseError(path, `Invalid JSON: ${errorMessage(error)}`);
    }

    if(!isRecord(document)) {
        throw new SourceParseError(path, 'Config must be a JSON object');
    }

    const serverMap = extractServerMap(document);
    if(!isRecord(serverMap)) {
        throw new SourceParseError(path, 'Invalid servers format');
    }

    return {
        path,
        entries: _.map(_.toPairs(serverMap), ([name, raw]) => ({ name, raw })),
    };
}

export async function readSource(path: string): Promise<RawSource> {
    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (error) {
        throw new SourceParseError(path, `Cannot read file: ${errorMessage(error)}`);
    }
    return parseSource(path, content);
}

/**
 * Load every location, keeping the given order
 */
export async function loadSources(paths: readonly string[]): Promise<SourceLoadResult> {
    const outcomes = await Promise.all(_.map(paths, async (path): Promise<RawSource | SkippedSource> => {
        try {
            return await readSource(path);
        } catch (error) {
            const reason = error instanceof SourceParseError ? error.message : errorMessage(error);
            logger.warn({ sourcePath: path, reason }, 'Skipping configuration source');
            return { path, reason };
        }
    }));

    const sources: RawSource[] = [];
    const skipped: SkippedSource[] = [];
    for(const outcome of outcomes) {
        if('entries' in outcome) {
            sources.push(outcome);
            logger.debug({ sourcePath: outcome.path, serverCount: outcome.entries.length }, 'Loaded configuration source');
        } else {
            skipped.push(outcome);
        }
    }
    return { sources, skipped };
}
