/**
 * Backend MCP Server Management
 *
 * This module is responsible for:
 * - Reading and validating configuration sources
 * - Probing backend servers for their tools, resources and prompts
 * - Owning the open backend sessions
 * - Deciding what is forwarded and forwarding calls to backend servers
 */

export { ClientManager, CLIENT_INFO, type SessionOptions } from './client-manager.js';
export { DiscoveryEngine, DEFAULT_PROBE_TIMEOUT_MS, flattenSources, type DiscoveryEngineOptions } from './discovery.js';
export {
    McpCapabilityProber,
    parameterSummary,
    toPromptDescriptor,
    toResourceDescriptor,
    toToolDescriptor,
    type CapabilityProber
} from './prober.js';
export { loadSources, parseSource, type RawSource, type SkippedSource, type SourceLoadResult } from './source-loader.js';
export { validateServerEntry, type EntryValidation } from './validation.js';
export {
    McpTransportExecutor,
    DEFAULT_CALL_TIMEOUT_MS,
    DEFAULT_INTERACTIVE_TIMEOUT_MS,
    fromElicitResult,
    toElicitResult,
    toElicitationRequest,
    type McpTransportExecutorOptions,
    type TransportExecutor
} from './executor.js';
export {
    ProxyControlPlane,
    exposedName,
    type ForwardedPrompt,
    type ForwardedResource,
    type ForwardedTool,
    type ForwardingSet,
    type ProxyControlPlaneOptions
} from './proxy.js';
export { TokenBucket } from './rate-limiter.js';
export { openRuntime, type Runtime, type RuntimeOptions } from './runtime.js';
