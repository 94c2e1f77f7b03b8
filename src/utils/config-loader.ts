/**
 * Shared Configuration Loading Utility
 *
 * Provides generic JSON loading with:
 * - JSON parsing
 * - Zod schema validation
 * - Optional default when the file is missing
 * - Atomic writes (temp file + rename)
 */

import { readFile, writeFile, rename, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { makeDirectory } from 'make-dir';
import _ from 'lodash';
import { dynamicLogger as logger } from './silent-logger.js';
import { errorMessage } from './errors.js';

/**
 * Options for loading JSON configuration
 */
export interface LoadJsonConfigOptions<T> {
    /** Path to the configuration file */
    path: string

    /** Zod schema for validation; its input may be looser than T (defaults) */
    schema: ZodType<T, ZodTypeDef, unknown>

    /** Raw value parsed through the schema when the file does not exist */
    defaultValue?: unknown
}

function isMissingFile(error: unknown): boolean {
    return _.isError(error) && 'code' in error && error.code === 'ENOENT';
}

/**
 * Render zod issues as `path: message` pairs
 */
export function formatZodIssues(error: ZodError): string {
    return _(error.issues)
        .map(issue => (issue.path.length > 0 ? `${_.join(issue.path, '.')}: ${issue.message}` : issue.message))
        .join(', ');
}

/**
 * Load and validate a JSON configuration file
 *
 * @throws Error if the file is missing (and no default is given), is invalid JSON, or fails validation
 *
 * @example
 * ```typescript
 * const settings = await loadJsonConfig({
 *   path: getProxySettingsPath(),
 *   schema: PersistedEnablementSchema,
 *   defaultValue: {},
 * });
 * ```
 */
export async function loadJsonConfig<T>(options: LoadJsonConfigOptions<T>): Promise<T> {
    const { path, schema, defaultValue } = options;

    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (error) {
        if(isMissingFile(error) && defaultValue !== undefined) {
            logger.debug({ path }, 'Config file not found, using default value');
            return schema.parse(_.cloneDeep(defaultValue));
        }
        if(isMissingFile(error)) {
            throw new Error(`Config file not found: ${path}`);
        }
        throw error;
    }

    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error) {
        throw new Error(`Invalid JSON in config file ${path}: ${errorMessage(error)}`);
    }

    try {
        return schema.parse(data);
    } catch (error) {
        if(error instanceof ZodError) {
            logger.error({ error: error.issues, configPath: path }, 'Invalid configuration file');
            throw new Error(`Invalid configuration in ${path}: ${formatZodIssues(error)}`);
        }
        throw error;
    }
}

/**
 * Write `data` as pretty JSON so that a concurrent reader sees either the old
 * file or the new one, never a partial write.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
    const tempPath = `${path}.tmp.${process.pid}`;
    try {
        await makeDirectory(dirname(path));
        await writeFile(tempPath, JSON.stringify(data, null, 2) + '\n', { encoding: 'utf-8', flag: 'w' });
        await rename(tempPath, path);
    } catch (error) {
        try {
            await unlink(tempPath);
        } catch (cleanupError) {
            logger.debug({ tempPath, error: errorMessage(cleanupError) }, 'Temp file cleanup skipped');
        }
        throw error;
    }
}
