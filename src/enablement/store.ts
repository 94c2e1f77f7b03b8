/**
 * Enablement Store
 *
 * Owns the allow-list that decides which discovered servers and capabilities
 * the proxy forwards, and persists it as `proxy-settings.json`.
 *
 * Default policy:
 * - Servers: everything is enabled while `enabledServers` is empty; once any
 *   key is listed, only listed servers are enabled.
 * - Capabilities: denied unless the server key has a set in the matching map
 *   and the identifier is in it.
 */

import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { loadJsonConfig, writeJsonAtomic } from '../utils/config-loader.js';
import { PersistenceError, errorMessage } from '../utils/errors.js';
import { getProxySettingsPath } from '../utils/config-paths.js';
import {
    PersistedEnablementSchema,
    ProxySettingsSchema,
    type PersistedEnablement,
    type ProxySettings
} from '../types/config.js';
import { makeServerKey } from '../types/server.js';

export type CapabilityKind = 'tool' | 'resource' | 'prompt';

export interface EnablementRecord {
    enabledServers:   Set<string>
    enabledTools:     Map<string, Set<string>>
    enabledResources: Map<string, Set<string>>
    enabledPrompts:   Map<string, Set<string>>
    settings:         ProxySettings
}

export function createDefaultRecord(): EnablementRecord {
    return fromPersisted(PersistedEnablementSchema.parse({}));
}

function toCapabilityMap(persisted: Record<string, string[]>): Map<string, Set<string>> {
    return new Map(_.map(_.toPairs(persisted), ([serverKey, ids]): [string, Set<string>] => [serverKey, new Set(ids)]));
}

function fromCapabilityMap(map: Map<string, Set<string>>): Record<string, string[]> {
    return _.fromPairs(_.map(Array.from(map.entries()), ([serverKey, ids]): [string, string[]] => [serverKey, Array.from(ids)]));
}

export function fromPersisted(persisted: PersistedEnablement): EnablementRecord {
    return {
        enabledServers:   new Set(persisted.enabledServers),
        enabledTools:     toCapabilityMap(persisted.enabledTools),
        enabledResources: toCapabilityMap(persisted.enabledResources),
        enabledPrompts:   toCapabilityMap(persisted.enabledPrompts),
        settings:         { ...persisted.settings },
    };
}

export function toPersisted(record: EnablementRecord): PersistedEnablement {
    return {
        settings:         { ...record.settings },
        enabledServers:   Array.from(record.enabledServers),
        enabledTools:     fromCapabilityMap(record.enabledTools),
        enabledResources: fromCapabilityMap(record.enabledResources),
        enabledPrompts:   fromCapabilityMap(record.enabledPrompts),
    };
}

function cloneRecord(record: EnablementRecord): EnablementRecord {
    return fromPersisted(toPersisted(record));
}

export class EnablementStore {
    private current: EnablementRecord;
    private persistenceError: PersistenceError | undefined;

    constructor(readonly path: string = getProxySettingsPath(), record: EnablementRecord = createDefaultRecord()) {
        this.current = cloneRecord(record);
    }

    /**
     * Create a store and load its persisted record
     */
    static async open(path: string = getProxySettingsPath()): Promise<EnablementStore> {
        const store = new EnablementStore(path);
        await store.load();
        return store;
    }

    /** Most recent read or write failure, cleared by the next success */
    get lastError(): PersistenceError | undefined {
        return this.persistenceError;
    }

    /** Detached copy of the current record */
    get record(): EnablementRecord {
        return cloneRecord(this.current);
    }

    get settings(): Readonly<ProxySettings> {
        return this.current.settings;
    }

    private capabilityMap(kind: CapabilityKind): Map<string, Set<string>> {
        switch(kind) {
            case 'tool':
                return this.current.enabledTools;
            case 'resource':
                return this.current.enabledResources;
            case 'prompt':
                return this.current.enabledPrompts;
        }
    }

    isServerEnabled(sourcePath: string, serverName: string): boolean {
        return this.current.enabledServers.size === 0
            || this.current.enabledServers.has(makeServerKey(sourcePath, serverName));
    }

    isCapabilityEnabled(kind: CapabilityKind, sourcePath: string, serverName: string, capabilityId: string): boolean {
        const enabled = this.capabilityMap(kind).get(makeServerKey(sourcePath, serverName));
        return enabled?.has(capabilityId) ?? false;
    }

    isToolEnabled(sourcePath: string, serverName: string, toolName: string): boolean {
        return this.isCapabilityEnabled('tool', sourcePath, serverName, toolName);
    }

    isResourceEnabled(sourcePath: string, serverName: string, resourceUri: string): boolean {
        return this.isCapabilityEnabled('resource', sourcePath, serverName, resourceUri);
    }

    isPromptEnabled(sourcePath: string, serverName: string, promptName: string): boolean {
        return this.isCapabilityEnabled('prompt', sourcePath, serverName, promptName);
    }

    /**
     * List the server and drop its capability maps. Capabilities stay denied
     * until each is added again.
     */
    enableAllForServer(sourcePath: string, serverName: string): void {
        const serverKey = makeServerKey(sourcePath, serverName);
        this.current.enabledServers.add(serverKey);
        this.current.enabledTools.delete(serverKey);
        this.current.enabledResources.delete(serverKey);
        this.current.enabledPrompts.delete(serverKey);
    }

    /**
     * Unlist the server only; its capability choices are kept for re-enabling
     */
    disableServer(sourcePath: string, serverName: string): void {
        this.current.enabledServers.delete(makeServerKey(sourcePath, serverName));
    }

    setServerEnabled(sourcePath: string, serverName: string, enabled: boolean): void {
        const serverKey = makeServerKey(sourcePath, serverName);
        if(enabled) {
            this.current.enabledServers.add(serverKey);
        } else {
            this.current.enabledServers.delete(serverKey);
        }
    }

    /**
     * Add or remove one capability id. Adding creates the server's set on
     * demand; removing keeps the (possibly empty) set.
     */
    setCapabilityEnabled(kind: CapabilityKind, sourcePath: string, serverName: string, capabilityId: string, enabled: boolean): void {
        const map = this.capabilityMap(kind);
        const serverKey = makeServerKey(sourcePath, serverName);
        const ids = map.get(serverKey);

        if(enabled) {
            if(ids) {
                ids.add(capabilityId);
            } else {
                map.set(serverKey, new Set([capabilityId]));
            }
        } else {
            ids?.delete(capabilityId);
        }
    }

    setToolEnabled(sourcePath: string, serverName: string, toolName: string, enabled: boolean): void {
        this.setCapabilityEnabled('tool', sourcePath, serverName, toolName, enabled);
    }

    setResourceEnabled(sourcePath: string, serverName: string, resourceUri: string, enabled: boolean): void {
        this.setCapabilityEnabled('resource', sourcePath, serverName, resourceUri, enabled);
    }

    setPromptEnabled(sourcePath: string, serverName: string, promptName: string, enabled: boolean): void {
        this.setCapabilityEnabled('prompt', sourcePath, serverName, promptName, enabled);
    }

    /**
     * Merge and validate new global settings
     *
     * @throws Error when the merged settings are invalid; the record is left unchanged
     */
    updateSettings(partial: Partial<ProxySettings>): ProxySettings {
        const merged = ProxySettingsSchema.parse({ ...this.current.settings, ...partial });
        this.current.settings = merged;
        return { ...merged };
    }

    /**
     * Read the persisted record. A missing file yields defaults; an unreadable
     * or corrupt one yields defaults and is reported through `lastError`.
     */
    async load(): Promise<EnablementRecord> {
        try {
            const persisted = await loadJsonConfig({
                path:         this.path,
                schema:       PersistedEnablementSchema,
                defaultValue: {},
            });
            this.current = fromPersisted(persisted);
            this.persistenceError = undefined;
        } catch (error) {
            this.persistenceError = new PersistenceError(this.path, 'read', errorMessage(error));
            logger.warn({ path: this.path, error: this.persistenceError.message }, 'Failed to load proxy settings, using defaults');
            this.current = createDefaultRecord();
        }
        return this.record;
    }

    /**
     * Write the whole record atomically
     *
     * @returns false when the write failed (see `lastError`)
     */
    async save(): Promise<boolean> {
        try {
            await writeJsonAtomic(this.path, toPersisted(this.current));
            this.persistenceError = undefined;
            logger.debug({ path: this.path }, 'Saved proxy settings');
            return true;
        } catch (error) {
            this.persistenceError = new PersistenceError(this.path, 'write', errorMessage(error));
            logger.error({ path: this.path, error: this.persistenceError.message }, 'Failed to save proxy settings');
            return false;
        }
    }
}
