/**
 * JSONL persistence for the operation log
 *
 * One JSON line per entry, appended through a single ordered write chain so
 * lines land in record order. Write failures are logged and counted, never
 * thrown back to the recorder.
 */

import { appendFile, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { makeDirectory } from 'make-dir';
import { z } from 'zod';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { errorMessage } from '../utils/errors.js';
import { LogEntryKind, type LogEntry } from '../types/log.js';

/** Append-only destination for recorded entries; must not throw */
export interface LogSink {
    append(entry: LogEntry): void
}

const ElicitationFieldSchema = z.object({
    name:        z.string(),
    type:        z.enum(['string', 'integer', 'number', 'boolean', 'object', 'array']),
    required:    z.boolean(),
    description: z.string(),
    default:     z.unknown().optional(),
    enumValues:  z.array(z.unknown()).optional(),
    const:       z.unknown().optional(),
});

const ElicitationRecordSchema = z.object({
    message:         z.string(),
    fields:          z.array(ElicitationFieldSchema),
    collectedValues: z.record(z.string(), z.unknown()),
    skippedFields:   z.array(z.string()),
    action:          z.enum(['accept', 'decline', 'cancel']),
    timestamp:       z.string(),
});

export const LogEntrySchema = z.object({
    id:            z.string(),
    timestamp:     z.string(),
    kind:          z.nativeEnum(LogEntryKind),
    serverName:    z.string(),
    operationName: z.string(),
    parameters:    z.record(z.string(), z.unknown()),
    response:      z.unknown().optional(),
    error:         z.string().optional(),
    durationMs:    z.number().optional(),
    elicitations:  z.array(ElicitationRecordSchema).optional(),
});

export class JsonlFileSink implements LogSink {
    private chain: Promise<void> = Promise.resolve();
    private directoryReady: Promise<void> | undefined;
    private failures = 0;

    constructor(readonly path: string) {}

    /** Number of entries that could not be written */
    get failureCount(): number {
        return this.failures;
    }

    append(entry: LogEntry): void {
        this.chain = this.chain.then(async () => this.write(entry));
    }

    /**
     * Resolves once every entry appended so far has been written (or failed)
     */
    async flush(): Promise<void> {
        await this.chain;
    }

    private async ensureDirectory(): Promise<void> {
        this.directoryReady ??= makeDirectory(dirname(this.path)).then(() => undefined);
        await this.directoryReady;
    }

    private async write(entry: LogEntry): Promise<void> {
        try {
            await this.ensureDirectory();
            await appendFile(this.path, JSON.stringify(entry) + '\n', 'utf-8');
        } catch (error) {
            this.failures++;
            // Retry directory creation on the next write
            this.directoryReady = undefined;
            logger.warn({ path: this.path, entryId: entry.id, error: errorMessage(error) }, 'Failed to persist log entry');
        }
    }
}

export interface ReadLogResult {
    entries:      LogEntry[]
    /** 1-based line numbers that were not valid entries */
    invalidLines: number[]
}

/**
 * Read a persisted JSONL log back, skipping lines that are not entries
 */
export async function readJsonlLog(path: string): Promise<ReadLogResult> {
    const content = await readFile(path, 'utf-8');
    const entries: LogEntry[] = [];
    const invalidLines: number[] = [];

    _.forEach(content.split('\n'), (line, index) => {
        if(line.trim() === '') {
            return;
        }
        let data: unknown;
        try {
            data = JSON.parse(line);
        } catch (error) {
            logger.debug({ path, line: index + 1, error: errorMessage(error) }, 'Skipping malformed log line');
            invalidLines.push(index + 1);
            return;
        }
        const parsed = LogEntrySchema.safeParse(data);
        if(parsed.success) {
            entries.push(parsed.data);
        } else {
            invalidLines.push(index + 1);
        }
    });

    return { entries, invalidLines };
}
