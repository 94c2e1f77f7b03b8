/**
 * Backend Server Discovery Engine
 *
 * Turns configuration sources into probed ConfigSource snapshots:
 * - Loads each source, skipping (with a reason) those that fail to parse
 * - Validates every entry, keeping invalid ones as `error` descriptors
 * - Probes the valid entries of a source concurrently, isolating failures
 * - Flattens sources for flat consumers, renaming cross-source collisions
 * - Merges supplemental (auto-detected) servers whose names are still free
 */

import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import {
    createDescriptor,
    markError,
    type ConfigSource,
    type ServerDescriptor
} from '../types/server.js';
import { loadSources, type RawSource, type SkippedSource } from './source-loader.js';
import { validateServerEntry, type EntryValidation } from './validation.js';
import type { CapabilityProber } from './prober.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 30000;

export interface DiscoveryEngineOptions {
    /** Explicitly configured source locations, in priority order */
    sourcePaths:        readonly string[]
    prober:             CapabilityProber
    /** Other clients' configuration files; their servers are merged unprobed */
    supplementalPaths?: readonly string[]
    /** Per-probe limit; 0 disables it */
    probeTimeoutMs?:    number
}

/**
 * Flat view across sources. A name already taken by an earlier source is
 * suffixed `#2`, `#3`, ... and the declared name kept as `originalName`.
 */
export function flattenSources(sources: readonly ConfigSource[]): ServerDescriptor[] {
    const taken = new Set<string>();
    const flattened: ServerDescriptor[] = [];

    for(const source of sources) {
        for(const server of source.servers) {
            if(!taken.has(server.name)) {
                taken.add(server.name);
                flattened.push(server);
                continue;
            }
            let suffix = 2;
            while(taken.has(`${server.name}#${suffix}`)) {
                suffix++;
            }
            const renamed = `${server.name}#${suffix}`;
            taken.add(renamed);
            logger.debug({ serverName: server.name, renamed, sourcePath: source.path }, 'Renamed colliding server');
            flattened.push({ ...server, name: renamed, originalName: server.name });
        }
    }
    return flattened;
}

export class DiscoveryEngine {
    private readonly sourcePaths: readonly string[];
    private readonly supplementalPaths: readonly string[];
    private readonly prober: CapabilityProber;
    private readonly probeTimeoutMs: number;
    private skipped: readonly SkippedSource[] = [];

    constructor(options: DiscoveryEngineOptions) {
        this.sourcePaths = options.sourcePaths;
        this.supplementalPaths = options.supplementalPaths ?? [];
        this.prober = options.prober;
        this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    }

    /**
     * Sources skipped by the most recent load, with the reason
     */
    get skippedSources(): readonly SkippedSource[] {
        return this.skipped;
    }

    async loadSources(): Promise<readonly RawSource[]> {
        const { sources, skipped } = await loadSources(this.sourcePaths);
        this.skipped = skipped;
        return sources;
    }

    validate(serverName: string, rawEntry: unknown): EntryValidation {
        return validateServerEntry(serverName, rawEntry);
    }

    /**
     * Probe one descriptor; whatever goes wrong comes back as an `error` descriptor
     */
    private async initializeServer(descriptor: ServerDescriptor): Promise<ServerDescriptor> {
        const controller = new AbortController();
        try {
            const probing = this.prober.probe(descriptor, controller.signal);
            return this.probeTimeoutMs > 0
                ? await withTimeout(probing, this.probeTimeoutMs, `Probe timed out after ${this.probeTimeoutMs}ms`)
                : await probing;
        } catch (error) {
            // Release the session of a probe nobody waits for any more
            controller.abort();
            logger.error(
                { serverName: descriptor.name, sourcePath: descriptor.sourcePath, error: errorMessage(error) },
                'Unexpected error initializing server'
            );
            return markError(descriptor, `Initialization failed: ${errorMessage(error)}`);
        }
    }

    private async discoverSource(source: RawSource): Promise<ConfigSource> {
        const servers = await Promise.all(_.map(source.entries, async ({ name, raw }) => {
            const validation = this.validate(name, raw);
            if(!validation.ok) {
                logger.warn({ serverName: name, sourcePath: source.path, error: validation.error.message }, 'Invalid server entry');
                return markError(createDescriptor(name, validation.connection, source.path), validation.error.message);
            }
            const descriptor = createDescriptor(
                name,
                validation.connection,
                source.path,
                validation.description !== undefined ? { description: validation.description } : {}
            );
            return this.initializeServer(descriptor);
        }));

        const failures = _.filter(servers, { status: 'error' }).length;
        logger.info(
            { sourcePath: source.path, serverCount: servers.length, connectedCount: servers.length - failures, failureCount: failures },
            'Finished discovering configuration source'
        );
        return { path: source.path, servers };
    }

    /**
     * One ConfigSource per successfully parsed location. Each source is
     * emitted only after all of its probes have settled.
     */
    async discoverHierarchical(): Promise<ConfigSource[]> {
        const rawSources = await this.loadSources();
        logger.info({ sourceCount: rawSources.length, skippedCount: this.skipped.length }, 'Discovering servers');

        const sources: ConfigSource[] = [];
        for(const rawSource of rawSources) {
            sources.push(await this.discoverSource(rawSource));
        }
        return sources;
    }

    flatten(sources: readonly ConfigSource[]): ServerDescriptor[] {
        return flattenSources(sources);
    }

    /**
     * Servers declared in supplemental locations, validated but not probed.
     * Entries that do not validate are left out.
     */
    async loadSupplementalServers(): Promise<ServerDescriptor[]> {
        if(this.supplementalPaths.length === 0) {
            return [];
        }
        const { sources, skipped } = await loadSources(this.supplementalPaths);
        for(const source of skipped) {
            logger.debug({ sourcePath: source.path, reason: source.reason }, 'Supplemental source unavailable');
        }

        const servers: ServerDescriptor[] = [];
        for(const source of sources) {
            for(const { name, raw } of source.entries) {
                const validation = validateServerEntry(name, raw);
                if(validation.ok) {
                    servers.push(createDescriptor(
                        name,
                        validation.connection,
                        source.path,
                        validation.description !== undefined ? { description: validation.description } : {}
                    ));
                }
            }
        }
        return servers;
    }

    /**
     * Flattened view plus supplemental servers whose names are not yet present
     */
    async discoverAll(): Promise<ServerDescriptor[]> {
        const servers = this.flatten(await this.discoverHierarchical());
        const names = new Set(_.map(servers, 'name'));

        for(const server of await this.loadSupplementalServers()) {
            if(!names.has(server.name)) {
                names.add(server.name);
                servers.push(server);
            }
        }
        return servers;
    }

    /**
     * Probe a server again from its connection parameters, keeping any name
     * the flattened view gave it
     */
    async refreshServer(server: ServerDescriptor): Promise<ServerDescriptor> {
        const declaredName = server.originalName ?? server.name;
        const fresh = createDescriptor(
            declaredName,
            server.connection,
            server.sourcePath,
            server.description !== undefined ? { description: server.description } : {}
        );
        const probed = await this.initializeServer(fresh);
        return server.originalName !== undefined
            ? { ...probed, name: server.name, originalName: server.originalName }
            : probed;
    }
}
