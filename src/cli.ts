#!/usr/bin/env node
/**
 * MCP Switchboard CLI Entry Point
 *
 * Modes:
 * - discover [--flat]: Probe every configured server and list what it offers
 * - status: Show proxy settings and the allow-list
 * - enable / enable-all / disable <key>: Change which servers are forwarded
 * - allow / deny <kind> <key> <id>: Change which capabilities are forwarded
 * - settings: Change global proxy settings
 * - call <tool>: Run one forwarded tool call, answering elicitations interactively
 * - serve: Start the stdio MCP proxy
 * - logs <file>: View a persisted operation log
 * - config-path: Show where the switchboard keeps its files
 *
 * <key> is the composite `sourcePath:serverName`.
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import _ from 'lodash';
import { z } from 'zod';
import type { RuntimeOptions } from './backend/runtime.js';
import type { CapabilityKind, EnablementStore } from './enablement/store.js';
import { capabilitiesSummary, parseServerKey, type ServerDescriptor } from './types/server.js';
import { errorMessage } from './utils/errors.js';

const PackageJsonSchema = z.object({
    version:     z.string(),
    description: z.string().default(''),
});

type PackageJson = z.infer<typeof PackageJsonSchema>;

interface GlobalOptions {
    config?:      string[]
    settings?:    string
    supplemental: boolean
}

const CAPABILITY_KINDS: readonly CapabilityKind[] = ['tool', 'resource', 'prompt'];

const ToolArgumentsSchema = z.record(z.string(), z.unknown());

/**
 * package.json sits one level above src/ and two above dist/src/
 */
async function readPackageJson(): Promise<PackageJson> {
    const here = dirname(fileURLToPath(import.meta.url));
    for(const candidate of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
        try {
            const parsed = PackageJsonSchema.safeParse(JSON.parse(await readFile(candidate, 'utf-8')));
            if(parsed.success) {
                return parsed.data;
            }
        } catch{
            // Not there; try the next candidate
        }
    }
    return { version: '0.0.0', description: '' };
}

const packageJson = await readPackageJson();

const program = new Command();

program
    .name('mcp-switchboard')
    .description(packageJson.description)
    .version(packageJson.version)
    .option('-c, --config <paths...>', 'Configuration source files (default: well-known locations)')
    .option('-s, --settings <path>', 'Proxy settings file (default: per-user data directory)')
    .option('--no-supplemental', 'Do not merge servers from other MCP clients\' configuration files');

function out(line = ''): void {
    // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
    console.log(line);
}

function fail(message: string): never {
    // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
    console.error(message);
    throw new Error(message);
}

function runtimeOptions(overrides: RuntimeOptions = {}): RuntimeOptions {
    const options = program.opts<GlobalOptions>();
    return {
        ...(options.config ? { configPaths: options.config } : {}),
        ...(options.settings ? { settingsPath: options.settings } : {}),
        supplemental: options.supplemental,
        logPath:      false,
        ...overrides,
    };
}

function serverKeyArgument(key: string): { sourcePath: string, serverName: string } {
    const parsed = parseServerKey(key);
    if(!parsed) {
        throw new InvalidArgumentError('Expected a server key of the form <sourcePath>:<serverName>');
    }
    return parsed;
}

function capabilityKindArgument(kind: string): CapabilityKind {
    const match = _.find(CAPABILITY_KINDS, candidate => candidate === kind);
    if(!match) {
        throw new InvalidArgumentError(`Expected one of: ${CAPABILITY_KINDS.join(', ')}`);
    }
    return match;
}

function positiveNumber(value: string): number {
    const parsed = Number(value);
    if(!Number.isFinite(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive number');
    }
    return parsed;
}

function printServer(server: ServerDescriptor, indent = '  '): void {
    const marker = server.status === 'connected' ? '✓' : server.status === 'error' ? '✗' : '·';
    const renamed = server.originalName ? ` (declared as ${server.originalName})` : '';
    out(`${indent}${marker} ${server.name}${renamed} ${capabilitiesSummary(server)}`);
    if(server.errorMessage) {
        out(`${indent}    ${server.errorMessage}`);
    }
}

async function openStore(): Promise<EnablementStore> {
    const { EnablementStore } = await import('./enablement/store.js');
    return EnablementStore.open(program.opts<GlobalOptions>().settings);
}

async function saveOrFail(store: EnablementStore): Promise<void> {
    if(!await store.save()) {
        fail(`Failed to save settings: ${store.lastError?.message ?? 'unknown error'}`);
    }
}

// Discover command - probe configured servers
program
    .command('discover')
    .description('Probe every configured server and list its capabilities')
    .option('--flat', 'Show the flattened view, including other clients\' servers')
    .action(async (options: { flat?: boolean }) => {
        const { openRuntime } = await import('./backend/runtime.js');
        const runtime = await openRuntime(runtimeOptions());
        try {
            if(options.flat) {
                const servers = await runtime.engine.discoverAll();
                out(`\nDiscovered Servers (${servers.length}):\n`);
                _.forEach(servers, server => printServer(server));
            } else {
                const sources = await runtime.engine.discoverHierarchical();
                for(const source of sources) {
                    out(`\n${source.path}`);
                    if(source.servers.length === 0) {
                        out('  (no servers)');
                    }
                    _.forEach(source.servers, server => printServer(server));
                }
            }
            for(const skipped of runtime.engine.skippedSources) {
                out(`\nSkipped ${skipped.path}: ${skipped.reason}`);
            }
            if(runtime.sourcePaths.length === 0) {
                out('No configuration sources found. Use --config to name one.');
            }
            out();
        } finally {
            await runtime.close();
        }
    });

// Status command - show settings and allow-list without probing
program
    .command('status')
    .description('Show proxy settings and the allow-list')
    .action(async () => {
        const store = await openStore();
        if(store.lastError) {
            out(`Warning: ${store.lastError.message} (showing defaults)`);
        }
        const { record } = store;

        out(`\nSettings file: ${store.path}`);
        out(`  Port:            ${record.settings.port}`);
        out(`  Logging:         ${record.settings.loggingOn ? 'on' : 'off'}`);
        out(`  Max log entries: ${record.settings.maxLogEntries}`);
        out(`  Rate limit:      ${record.settings.rateLimit === undefined ? 'none' : `${record.settings.rateLimit}/s`}`);

        if(record.enabledServers.size === 0) {
            out('\nAll servers enabled (no restriction configured)');
        } else {
            out(`\nEnabled servers (${record.enabledServers.size}):`);
            for(const key of record.enabledServers) {
                const count = (map: Map<string, Set<string>>) => map.get(key)?.size ?? 0;
                out(`  ${key}  tools: ${count(record.enabledTools)}, resources: ${count(record.enabledResources)}, prompts: ${count(record.enabledPrompts)}`);
            }
        }
        out();
    });

program
    .command('enable')
    .description('Forward a server (capabilities still need allowing)')
    .argument('<key>', 'Server key <sourcePath>:<serverName>', serverKeyArgument)
    .action(async (key: { sourcePath: string, serverName: string }) => {
        const store = await openStore();
        store.setServerEnabled(key.sourcePath, key.serverName, true);
        await saveOrFail(store);
        out(`Enabled ${key.sourcePath}:${key.serverName}`);
    });

program
    .command('enable-all')
    .description('Forward a server and allow every capability it currently offers')
    .argument('<key>', 'Server key <sourcePath>:<serverName>', serverKeyArgument)
    .action(async (key: { sourcePath: string, serverName: string }) => {
        const { openRuntime } = await import('./backend/runtime.js');
        const runtime = await openRuntime(runtimeOptions());
        try {
            const { store, engine } = runtime;
            const sources = await engine.discoverHierarchical();
            const server = _.find(
                _.find(sources, { path: key.sourcePath })?.servers,
                candidate => candidate.name === key.serverName
            );

            store.enableAllForServer(key.sourcePath, key.serverName);
            if(server?.status === 'connected') {
                _.forEach(server.tools, tool => store.setToolEnabled(key.sourcePath, key.serverName, tool.name, true));
                _.forEach(server.resources, resource => store.setResourceEnabled(key.sourcePath, key.serverName, resource.uri, true));
                _.forEach(server.prompts, prompt => store.setPromptEnabled(key.sourcePath, key.serverName, prompt.name, true));
                out(`Enabled ${key.sourcePath}:${key.serverName}: ${server.tools.length} tools, ${server.resources.length} resources, ${server.prompts.length} prompts`);
            } else {
                out(`Enabled ${key.sourcePath}:${key.serverName}, but no capabilities were allowed: ${server?.errorMessage ?? 'server not found'}`);
            }
            await saveOrFail(store);
        } finally {
            await runtime.close();
        }
    });

program
    .command('disable')
    .description('Stop forwarding a server (its capability choices are kept)')
    .argument('<key>', 'Server key <sourcePath>:<serverName>', serverKeyArgument)
    .action(async (key: { sourcePath: string, serverName: string }) => {
        const store = await openStore();
        store.disableServer(key.sourcePath, key.serverName);
        await saveOrFail(store);
        out(`Disabled ${key.sourcePath}:${key.serverName}`);
    });

for(const [name, enabled] of [['allow', true], ['deny', false]] as const) {
    program
        .command(name)
        .description(enabled ? 'Forward one tool, resource or prompt' : 'Stop forwarding one tool, resource or prompt')
        .argument('<kind>', CAPABILITY_KINDS.join(' | '), capabilityKindArgument)
        .argument('<key>', 'Server key <sourcePath>:<serverName>', serverKeyArgument)
        .argument('<id>', 'Tool name, resource URI or prompt name')
        .action(async (kind: CapabilityKind, key: { sourcePath: string, serverName: string }, id: string) => {
            const store = await openStore();
            store.setCapabilityEnabled(kind, key.sourcePath, key.serverName, id, enabled);
            await saveOrFail(store);
            out(`${enabled ? 'Allowed' : 'Denied'} ${kind} ${id} on ${key.sourcePath}:${key.serverName}`);
        });
}

program
    .command('settings')
    .description('Change global proxy settings')
    .option('--port <port>', 'Port recorded for the proxy', positiveNumber)
    .option('--logging <state>', 'on or off')
    .option('--max-log-entries <count>', 'Operation log capacity', positiveNumber)
    .option('--rate-limit <perSecond>', 'Maximum forwarded requests per second', positiveNumber)
    .action(async (options: { port?: number, logging?: string, maxLogEntries?: number, rateLimit?: number }) => {
        const store = await openStore();
        if(options.logging !== undefined && options.logging !== 'on' && options.logging !== 'off') {
            fail(`Invalid --logging value: ${options.logging} (expected on or off)`);
        }
        try {
            const updated = store.updateSettings({
                ...(options.port !== undefined ? { port: options.port } : {}),
                ...(options.logging !== undefined ? { loggingOn: options.logging === 'on' } : {}),
                ...(options.maxLogEntries !== undefined ? { maxLogEntries: options.maxLogEntries } : {}),
                ...(options.rateLimit !== undefined ? { rateLimit: options.rateLimit } : {}),
            });
            await saveOrFail(store);
            out(JSON.stringify(updated, null, 2));
        } catch (error) {
            fail(`Invalid settings: ${errorMessage(error)}`);
        }
    });

program
    .command('call')
    .description('Run one forwarded tool call, answering elicitations interactively')
    .argument('<tool>', 'Exposed tool name <server>_<tool>')
    .option('--args <json>', 'Tool arguments as a JSON object', '{}')
    .option('--log <path>', 'Also persist the operation log to this file')
    .action(async (toolName: string, options: { args: string, log?: string }) => {
        let json: unknown;
        try {
            json = JSON.parse(options.args);
        } catch (error) {
            fail(`Invalid --args: ${errorMessage(error)}`);
        }
        const parsedArgs = ToolArgumentsSchema.safeParse(json);
        if(!parsedArgs.success) {
            fail('Invalid --args: expected a JSON object');
        }
        const toolArgs = parsedArgs.data;

        const { openRuntime } = await import('./backend/runtime.js');
        const runtime = await openRuntime(runtimeOptions(options.log ? { logPath: options.log } : {}));
        try {
            runtime.control.setSources(await runtime.engine.discoverHierarchical());

            if(process.stdin.isTTY) {
                const { ElicitationCoordinator } = await import('./elicitation/coordinator.js');
                const { runCallScreen } = await import('./admin/index.js');
                const { summary, failed } = await runCallScreen(runtime.control, new ElicitationCoordinator(), toolName, toolArgs);
                out(summary);
                if(failed) {
                    process.exitCode = 1;
                }
            } else {
                const { resultText } = await import('./admin/format.js');
                const result = await runtime.control.callTool(toolName, toolArgs);
                out(resultText(result));
                if(result.isError) {
                    process.exitCode = 1;
                }
            }
        } finally {
            await runtime.close();
        }
    });

// Serve command - start the MCP proxy on stdio
program
    .command('serve')
    .description('Start the MCP proxy on stdio')
    .option('--no-log-file', 'Keep the operation log in memory only')
    .action(async (options: { logFile: boolean }) => {
        const { startServer } = await import('./frontend/index.js');
        const { getProxyLogPath } = await import('./utils/config-paths.js');
        await startServer(runtimeOptions({ logPath: options.logFile ? getProxyLogPath() : false }));
    });

program
    .command('logs')
    .description('View a persisted operation log')
    .argument('<file>', 'JSONL log file')
    .option('--print', 'Print the entries instead of opening the viewer')
    .action(async (file: string, options: { print?: boolean }) => {
        const { readJsonlLog } = await import('./logging/file-sink.js');
        const { OperationLog, DEFAULT_MAX_LOG_ENTRIES } = await import('./logging/operation-log.js');
        const { entries, invalidLines } = await readJsonlLog(file);
        const log = new OperationLog({ maxEntries: Math.max(entries.length, DEFAULT_MAX_LOG_ENTRIES) });
        log.replay(entries);

        if(invalidLines.length > 0) {
            // eslint-disable-next-line no-console -- CLI warning to stderr is appropriate
            console.error(`Skipped ${invalidLines.length} invalid line(s): ${invalidLines.join(', ')}`);
        }

        if(options.print || !process.stdout.isTTY) {
            const { formatEntryLine, formatStats } = await import('./admin/format.js');
            _.forEach(log.entries, entry => out(formatEntryLine(entry)));
            out(formatStats(log.stats()));
            return;
        }
        const { runLogViewer } = await import('./admin/index.js');
        await runLogViewer(log, file);
    });

// Config-path command - show where files are located
program
    .command('config-path')
    .description('Show the data directory path')
    .option('-v, --verbose', 'Show detailed paths, including discovery locations')
    .action(async (options: { verbose?: boolean }) => {
        const {
            getDataDir,
            getProxySettingsPath,
            getProxyLogDir,
            getCandidateSourcePaths,
            getSupplementalSourcePaths,
            filterExisting
        } = await import('./utils/config-paths.js');

        if(!options.verbose) {
            // Just output the directory path for easy scripting
            out(getDataDir());
            return;
        }

        const candidates = getCandidateSourcePaths();
        const supplemental = getSupplementalSourcePaths();
        const existing = new Set(await filterExisting([...candidates, ...supplemental]));
        const mark = (path: string) => `${existing.has(path) ? '✓' : ' '} ${path}`;

        out('\nPaths:');
        out(`  Data directory: ${getDataDir()}`);
        out(`  Settings:       ${getProxySettingsPath()}`);
        out(`  Logs:           ${getProxyLogDir()}`);
        out('\nConfiguration sources:');
        _.forEach(candidates, path => out(`  ${mark(path)}`));
        out('\nOther clients\' configuration:');
        _.forEach(supplemental, path => out(`  ${mark(path)}`));
        out();
    });

await program.parseAsync();
