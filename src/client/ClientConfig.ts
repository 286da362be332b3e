/**
 * ClientConfig — Per-Instance Client Settings
 *
 * What a resource client or the aggregate client is constructed with.
 * Input is checked with a strict zod schema (unknown keys are rejected)
 * and resolved into the concrete base URL, headers and transport every
 * invocation runs against.
 *
 * Base URL precedence:
 *   1. `baseUrl`
 *   2. `servers[serverIndex ?? 0]` from the document, with `{variable}`
 *      placeholders filled from `serverVariables`, then the server's
 *      declared defaults
 *
 * @module
 */
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { isRecord } from '../parser/types.js';
import type { ServerInfo } from '../parser/DocumentLoader.js';
import { resolveObserver, type DebugObserverFn, type DebugOption } from '../observability/DebugObserver.js';
import { isTracer, type ClientTracer } from '../observability/Tracing.js';
import { FetchTransport } from '../transport/FetchTransport.js';
import type { Transport, TransportOptions } from '../transport/Transport.js';

// ── Types ────────────────────────────────────────────────

export interface ClientConfig {
    /** Overrides every server declared in the document */
    readonly baseUrl?: string;
    /** Which declared server to use (default: 0) */
    readonly serverIndex?: number;
    /** Values for `{variable}` placeholders in the server URL */
    readonly serverVariables?: Readonly<Record<string, string | number>>;
    /** Sent with every call of this instance */
    readonly headers?: Readonly<Record<string, string>>;
    /** Default: a {@link FetchTransport} over `globalThis.fetch` */
    readonly transport?: Transport;
    /** Passed to the transport untouched (timeouts, credentials, …) */
    readonly transportOptions?: TransportOptions;
    /** Overrides the build's debug observer for this instance */
    readonly debug?: DebugOption;
    /** OpenTelemetry-compatible tracer; one span per call */
    readonly tracer?: ClientTracer;
}

/** A validated config, ready for invocation. */
export interface ResolvedClientConfig {
    /** Without a trailing slash */
    readonly baseUrl: string;
    readonly headers: Readonly<Record<string, string>>;
    readonly transport: Transport;
    readonly transportOptions: TransportOptions;
    readonly observer?: DebugObserverFn;
    readonly tracer?: ClientTracer;
}

// ── Schema ───────────────────────────────────────────────

const clientConfigSchema = z.object({
    baseUrl: z.string().min(1).optional(),
    serverIndex: z.number().int().nonnegative().optional(),
    serverVariables: z.record(z.string(), z.union([z.string(), z.number()])).optional(),
    headers: z.record(z.string(), z.string()).optional(),
    transport: z.custom<Transport>(isTransport, { message: 'Expected an object with an execute() method' }).optional(),
    transportOptions: z.record(z.string(), z.unknown()).optional(),
    debug: z.custom<DebugOption>(
        value => typeof value === 'boolean' || typeof value === 'function',
        { message: 'Expected a boolean or an observer function' },
    ).optional(),
    tracer: z.custom<ClientTracer>(isTracer, { message: 'Expected an object with a startSpan() method' }).optional(),
}).strict();

function isTransport(value: unknown): value is Transport {
    return isRecord(value) && typeof value['execute'] === 'function';
}

// ── Resolution ───────────────────────────────────────────

/**
 * Validate a client config and resolve its base URL against the
 * document's servers.
 *
 * @param input - Raw constructor argument
 * @param servers - Servers declared by the document
 * @param fallbackObserver - Build-level observer, used when the config sets no `debug`
 * @throws ConfigurationError on invalid input or when no base URL can be determined
 */
export function resolveClientConfig(
    input: unknown,
    servers: readonly ServerInfo[],
    fallbackObserver?: DebugObserverFn,
): ResolvedClientConfig {
    const result = clientConfigSchema.safeParse(input ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(issue =>
            `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
        );
        throw new ConfigurationError(`Invalid client config: ${issues.join('; ')}`);
    }
    const config = result.data;

    const observer = config.debug !== undefined ? resolveObserver(config.debug) : fallbackObserver;

    return {
        baseUrl: resolveBaseUrl(config, servers),
        headers: { ...(config.headers ?? {}) },
        transport: config.transport ?? new FetchTransport(),
        transportOptions: { ...(config.transportOptions ?? {}) },
        ...(observer ? { observer } : {}),
        ...(config.tracer ? { tracer: config.tracer } : {}),
    };
}

/**
 * Determine the base URL of a client.
 *
 * @throws ConfigurationError when nothing yields a URL
 */
export function resolveBaseUrl(
    config: Pick<ClientConfig, 'baseUrl' | 'serverIndex' | 'serverVariables'>,
    servers: readonly ServerInfo[],
): string {
    if (config.baseUrl !== undefined) {
        return stripTrailingSlash(config.baseUrl);
    }

    const index = config.serverIndex ?? 0;
    const server = servers[index];
    if (!server) {
        throw new ConfigurationError(
            servers.length === 0
                ? 'No baseUrl given and the document declares no servers'
                : `serverIndex ${index} is out of range (${servers.length} servers declared)`,
        );
    }

    const variables = config.serverVariables ?? {};
    const url = server.url.replace(/\{([^}]+)\}/g, (_match, name: string) => {
        const value = variables[name] ?? server.variables[name];
        if (value === undefined) {
            throw new ConfigurationError(`Server variable "${name}" of "${server.url}" has no value`);
        }
        return String(value);
    });

    return stripTrailingSlash(url);
}

function stripTrailingSlash(url: string): string {
    return url.endsWith('/') ? url.slice(0, -1) : url;
}
