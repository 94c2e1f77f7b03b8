/**
 * File system test helpers
 * Temporary directories and files, removed again by `cleanup()`
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import _ from 'lodash';

const cleanupRegistry: string[] = [];

/**
 * Create a unique temporary directory, registered for cleanup
 */
export async function createTempDir(prefix = 'switchboard-test'): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
    cleanupRegistry.push(dir);
    return dir;
}

/**
 * Write a file into `directory` (a fresh temp dir when omitted). Objects are
 * written as pretty JSON.
 */
export async function createTempFile(
    content: string | Record<string, unknown>,
    options: { filename?: string, directory?: string } = {}
): Promise<string> {
    const dir = options.directory ?? await createTempDir('temp-file');
    const filePath = join(dir, options.filename ?? 'config.json');
    await writeFile(filePath, _.isString(content) ? content : JSON.stringify(content, null, 2), 'utf-8');
    return filePath;
}

export async function readJson(path: string): Promise<unknown> {
    return JSON.parse(await readFile(path, 'utf-8'));
}

/**
 * Remove everything created through this module. Call from afterEach.
 */
export async function cleanup(): Promise<void> {
    const paths = cleanupRegistry.splice(0);
    await Promise.all(_.map(paths, async path => rm(path, { recursive: true, force: true })));
}
