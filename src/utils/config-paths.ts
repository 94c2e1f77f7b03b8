/**
 * Configuration file path utilities
 * Provides cross-platform paths for the switchboard's own files and the
 * well-known locations where MCP clients keep their server declarations.
 */

import envPaths from 'env-paths';
import { makeDirectory } from 'make-dir';
import { access, constants } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import _ from 'lodash';

// suffix: '' removes the default '-nodejs' suffix
const paths = envPaths('mcp-switchboard', { suffix: '' });

/**
 * Get the data directory path
 * This is where proxy-settings.json and proxy-logs/ are stored
 */
export function getDataDir(): string {
    return paths.data;
}

/**
 * Get the full path to the persisted enablement record
 */
export function getProxySettingsPath(): string {
    return join(paths.data, 'proxy-settings.json');
}

/**
 * Get the directory holding persisted operation logs
 */
export function getProxyLogDir(): string {
    return join(paths.data, 'proxy-logs');
}

/**
 * Path of a fresh operation log file for a run started at `startedAt`
 */
export function getProxyLogPath(startedAt = new Date()): string {
    return join(getProxyLogDir(), `proxy-${Math.floor(startedAt.getTime() / 1000)}.jsonl`);
}

/**
 * Ensure the data directory (and the log directory beneath it) exists
 */
export async function ensureDataDir(): Promise<string> {
    await makeDirectory(getProxyLogDir());
    return paths.data;
}

/**
 * Locations explicitly configured for discovery, in priority order
 */
export function getCandidateSourcePaths(home = homedir(), cwd = process.cwd()): string[] {
    return [
        join(home, 'Library', 'Application Support', 'Claude', 'claude_desktop_config.json'),
        join(home, 'mcp.json'),
        join(home, '.config', 'github-copilot', 'intellij', 'mcp.json'),
        join(home, '.config', 'mcp', 'config.json'),
        join(home, '.mcp', 'config.json'),
        join(cwd, 'mcp.json'),
        join(cwd, '.mcp.json'),
    ];
}

/**
 * Configuration files of other MCP clients, scanned as supplemental sources
 */
export function getSupplementalSourcePaths(home = homedir()): string[] {
    return [
        join(home, '.cursor', 'mcp.json'),
        join(home, '.codeium', 'windsurf', 'mcp_config.json'),
        join(home, '.claude.json'),
    ];
}

/**
 * Keep only the paths that exist and are readable, preserving order
 */
export async function filterExisting(candidates: string[]): Promise<string[]> {
    const checks = await Promise.all(_.map(candidates, async (candidate) => {
        try {
            await access(candidate, constants.R_OK);
            return candidate;
        } catch{
            return undefined;
        }
    }));
    return _.compact(checks);
}
