/**
 * Configuration type definitions for the switchboard
 *
 * Server entries follow the `mcpServers` format shared by Claude Desktop,
 * Cursor and most other MCP clients; a missing `type` means stdio.
 */

import { z } from 'zod';

export const SERVER_KINDS = ['stdio', 'http', 'sse'] as const;

// Env values are stringified the way a shell would see them
const EnvValueSchema = z
    .union([z.string(), z.number(), z.boolean()], { errorMap: () => ({ message: "'env' values must be strings" }) })
    .transform(value => String(value));

const DescriptionSchema = z.string({ invalid_type_error: "'description' must be a string" }).optional();

export const StdioServerEntrySchema = z.object({
    type:    z.literal('stdio').optional(),
    command: z
        .string({
            required_error:     "stdio server must have 'command' field",
            invalid_type_error: "'command' must be a string",
        })
        .min(1, 'No command specified in configuration'),
    args: z
        .array(z.string({ invalid_type_error: "'args' entries must be strings" }), { invalid_type_error: "'args' must be a list" })
        .optional(),
    env: z
        .record(z.string(), EnvValueSchema, { invalid_type_error: "'env' must be an object" })
        .optional(),
    cwd:         z.string({ invalid_type_error: "'cwd' must be a string" }).optional(),
    description: DescriptionSchema,
}).passthrough();

function remoteServerEntrySchema<K extends 'http' | 'sse'>(kind: K) {
    return z.object({
        type: z.literal(kind),
        url:  z
            .string({
                required_error:     `${kind} server must have 'url' field`,
                invalid_type_error: "'url' must be a string",
            })
            .min(1, 'No URL specified in configuration'),
        headers: z
            .record(z.string(), z.string({ invalid_type_error: "'headers' values must be strings" }), { invalid_type_error: "'headers' must be an object" })
            .optional(),
        description: DescriptionSchema,
    }).passthrough();
}

export const HttpServerEntrySchema = remoteServerEntrySchema('http');
export const SseServerEntrySchema = remoteServerEntrySchema('sse');

export type StdioServerEntry = z.infer<typeof StdioServerEntrySchema>;
export type HttpServerEntry = z.infer<typeof HttpServerEntrySchema>;
export type SseServerEntry = z.infer<typeof SseServerEntrySchema>;

/**
 * Global proxy settings stored next to the allow-list
 */
export const ProxySettingsSchema = z.object({
    enabled:       z.boolean().default(false),
    port:          z.number().int().min(1).max(65535).default(3000),
    loggingOn:     z.boolean().default(true),
    maxLogEntries: z.number().int().positive().default(1000),
    /** Max forwarded requests per second; absent means unlimited */
    rateLimit:     z.number().positive().optional(),
});

export type ProxySettings = z.infer<typeof ProxySettingsSchema>;

const CapabilityMapSchema = z.record(z.string(), z.array(z.string())).default({});

/**
 * On-disk form of the enablement record: sets become arrays
 */
export const PersistedEnablementSchema = z.object({
    settings:         ProxySettingsSchema.default({}),
    enabledServers:   z.array(z.string()).default([]),
    enabledTools:     CapabilityMapSchema,
    enabledResources: CapabilityMapSchema,
    enabledPrompts:   CapabilityMapSchema,
});

export type PersistedEnablement = z.infer<typeof PersistedEnablementSchema>;
