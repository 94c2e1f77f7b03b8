/**
 * Wires the backend pieces together for the CLI commands and the front end
 */

import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import {
    filterExisting,
    getCandidateSourcePaths,
    getProxyLogPath,
    getProxySettingsPath,
    getSupplementalSourcePaths
} from '../utils/config-paths.js';
import { EnablementStore } from '../enablement/store.js';
import { JsonlFileSink } from '../logging/file-sink.js';
import { OperationLog } from '../logging/operation-log.js';
import { ClientManager } from './client-manager.js';
import { DiscoveryEngine } from './discovery.js';
import { McpCapabilityProber } from './prober.js';
import { McpTransportExecutor } from './executor.js';
import { ProxyControlPlane } from './proxy.js';

export interface RuntimeOptions {
    /** Source files to discover from; defaults to the well-known locations that exist */
    configPaths?:       string[]
    /** Merge other clients' configuration files (default true) */
    supplemental?:      boolean
    settingsPath?:      string
    /** Where to persist the operation log; false keeps it in memory only */
    logPath?:           string | false
    probeTimeoutMs?:    number
    callTimeoutMs?:     number
}

export interface Runtime {
    readonly sourcePaths:   readonly string[]
    readonly store:         EnablementStore
    readonly log:           OperationLog
    readonly sink:          JsonlFileSink | undefined
    readonly clientManager: ClientManager
    readonly engine:        DiscoveryEngine
    readonly control:       ProxyControlPlane
    /** Close open backend sessions and wait for pending log writes */
    close(): Promise<void>
}

export async function openRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
    const sourcePaths = options.configPaths ?? await filterExisting(getCandidateSourcePaths());
    const supplementalPaths = options.supplemental === false ? [] : await filterExisting(getSupplementalSourcePaths());
    logger.debug({ sourcePaths, supplementalPaths }, 'Resolved configuration sources');

    const store = await EnablementStore.open(options.settingsPath ?? getProxySettingsPath());
    const logPath = options.logPath ?? getProxyLogPath();
    const sink = logPath === false ? undefined : new JsonlFileSink(logPath);
    const log = new OperationLog({ maxEntries: store.settings.maxLogEntries, ...(sink ? { sink } : {}) });

    const clientManager = new ClientManager();
    const engine = new DiscoveryEngine({
        sourcePaths,
        supplementalPaths,
        prober: new McpCapabilityProber(clientManager),
        ...(_.isNumber(options.probeTimeoutMs) ? { probeTimeoutMs: options.probeTimeoutMs } : {}),
    });
    const executor = new McpTransportExecutor(
        clientManager,
        _.isNumber(options.callTimeoutMs) ? { timeoutMs: options.callTimeoutMs } : {}
    );
    const control = new ProxyControlPlane({ store, log, executor });

    return {
        sourcePaths,
        store,
        log,
        sink,
        clientManager,
        engine,
        control,
        close: async () => {
            await clientManager.closeAll();
            await sink?.flush();
        },
    };
}
