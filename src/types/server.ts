/**
 * Discovered server and capability model
 */

export type ServerKind = 'stdio' | 'http' | 'sse';

export type ServerStatus = 'disconnected' | 'connected' | 'error';

export interface StdioConnectionParams {
    readonly kind:    'stdio'
    readonly command: string
    readonly args:    readonly string[]
    readonly env:     Readonly<Record<string, string>>
    readonly cwd?:    string
}

export interface RemoteConnectionParams {
    readonly kind:    'http' | 'sse'
    readonly url:     string
    readonly headers: Readonly<Record<string, string>>
}

export type ConnectionParams = StdioConnectionParams | RemoteConnectionParams;

/** One parameter of a tool, derived from its JSON input schema */
export interface ToolParameter {
    readonly name:         string
    readonly type:         string
    readonly description?: string
    readonly required:     boolean
    readonly default?:     unknown
}

export interface ToolDescriptor {
    readonly name:         string
    readonly description?: string
    readonly inputSchema:  Readonly<Record<string, unknown>>
    readonly parameters:   readonly ToolParameter[]
}

export interface ResourceDescriptor {
    readonly uri:          string
    readonly name:         string
    readonly description?: string
    readonly mimeType?:    string
}

export interface PromptArgument {
    readonly name:         string
    readonly description?: string
    readonly required:     boolean
}

export interface PromptDescriptor {
    readonly name:         string
    readonly description?: string
    readonly arguments:    readonly PromptArgument[]
}

export interface ServerDescriptor {
    readonly name:          string
    readonly kind:          ServerKind
    readonly connection:    ConnectionParams
    readonly status:        ServerStatus
    readonly errorMessage?: string
    readonly description?:  string
    /** Name as declared in its source, when the flattened view renamed it */
    readonly originalName?: string
    readonly serverInfo?:   { readonly name: string, readonly version: string }
    readonly tools:         readonly ToolDescriptor[]
    readonly resources:     readonly ResourceDescriptor[]
    readonly prompts:       readonly PromptDescriptor[]
    readonly sourcePath:    string
}

/** Servers declared by one configuration location */
export interface ConfigSource {
    readonly path:    string
    readonly servers: readonly ServerDescriptor[]
}

/**
 * Composite key `sourcePath:name` that disambiguates identically named
 * servers declared in different sources
 */
export function makeServerKey(sourcePath: string, serverName: string): string {
    return `${sourcePath}:${serverName}`;
}

/**
 * Composite key of a descriptor, using the name as declared in its source so a
 * server renamed by the flattened view keeps its identity
 */
export function serverKeyOf(server: Pick<ServerDescriptor, 'sourcePath' | 'name' | 'originalName'>): string {
    return makeServerKey(server.sourcePath, server.originalName ?? server.name);
}

/**
 * Split a composite key back into its parts. Source paths may themselves
 * contain ':' (Windows drives), server names may not.
 */
export function parseServerKey(key: string): { sourcePath: string, serverName: string } | undefined {
    const separator = key.lastIndexOf(':');
    if(separator <= 0 || separator === key.length - 1) {
        return undefined;
    }
    return { sourcePath: key.slice(0, separator), serverName: key.slice(separator + 1) };
}

/**
 * A fresh, not yet probed descriptor
 */
export function createDescriptor(
    name: string,
    connection: ConnectionParams,
    sourcePath: string,
    extras: { description?: string } = {}
): ServerDescriptor {
    return {
        name,
        kind:      connection.kind,
        connection,
        status:    'disconnected',
        tools:     [],
        resources: [],
        prompts:   [],
        sourcePath,
        ...extras,
    };
}

export function markError(server: ServerDescriptor, errorMessage: string): ServerDescriptor {
    return { ...server, status: 'error', errorMessage };
}

/**
 * Short human summary, e.g. `[STDIO] 3 tools, 1 prompts`
 */
export function capabilitiesSummary(server: ServerDescriptor): string {
    const parts: string[] = [];
    if(server.tools.length > 0) {
        parts.push(`${server.tools.length} tools`);
    }
    if(server.resources.length > 0) {
        parts.push(`${server.resources.length} resources`);
    }
    if(server.prompts.length > 0) {
        parts.push(`${server.prompts.length} prompts`);
    }
    return `[${server.kind.toUpperCase()}] ${parts.length > 0 ? parts.join(', ') : 'No capabilities'}`;
}
