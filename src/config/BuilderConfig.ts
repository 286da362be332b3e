/**
 * BuilderConfig — Build-Time Configuration
 *
 * Controls how a document is turned into a client module: naming style,
 * which operations are kept, the default group and the name of the
 * aggregate client class.
 *
 * Can be loaded from `openapi-client.yaml` or passed programmatically.
 *
 * @module
 */
import type { MemberStyle } from '../naming/NamingTranslator.js';
import type { DateMode } from '../schema/DataModel.js';
import type { DebugOption } from '../observability/DebugObserver.js';

// ── Naming Config ────────────────────────────────────────

/** Controls how members are named */
export interface NamingConfig {
    /** Casing of methods, fields, parameters and group attributes */
    readonly style: MemberStyle;
}

// ── Full Config ──────────────────────────────────────────

export interface BuilderConfig {
    /** Name of the aggregate client class */
    readonly clientName: string;
    /** Group of operations that declare no tag */
    readonly defaultGroup: string;
    readonly naming: NamingConfig;
    /** Only build these groups (empty = all) */
    readonly includeTags: readonly string[];
    /** Leave these groups out */
    readonly excludeTags: readonly string[];
    /** Deprecated operations: 'include' = bind normally, 'skip' = omit */
    readonly deprecated: 'include' | 'skip';
    /** `date-time` fields: 'string' = keep the wire string, 'date' = hydrate to `Date` */
    readonly dates: DateMode;
    /** Observer for build and call events; `true` = console output */
    readonly debug?: DebugOption;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: BuilderConfig = {
    clientName: 'ApiClient',
    defaultGroup: 'default',
    naming: {
        style: 'camelCase',
    },
    includeTags: [],
    excludeTags: [],
    deprecated: 'include',
    dates: 'string',
};

// ── Merge Helper ─────────────────────────────────────────

/**
 * Deep-merge a partial config with defaults.
 * Partial values override defaults at each level.
 */
export function mergeConfig(partial: PartialConfig = {}): BuilderConfig {
    return {
        clientName: partial.clientName ?? DEFAULT_CONFIG.clientName,
        defaultGroup: partial.defaultGroup ?? DEFAULT_CONFIG.defaultGroup,
        naming: {
            ...DEFAULT_CONFIG.naming,
            ...(partial.naming ?? {}),
        },
        includeTags: partial.includeTags ?? DEFAULT_CONFIG.includeTags,
        excludeTags: partial.excludeTags ?? DEFAULT_CONFIG.excludeTags,
        deprecated: partial.deprecated ?? DEFAULT_CONFIG.deprecated,
        dates: partial.dates ?? DEFAULT_CONFIG.dates,
        ...(partial.debug !== undefined ? { debug: partial.debug } : {}),
    };
}

/** Partial config shape for merging */
export interface PartialConfig {
    readonly clientName?: string;
    readonly defaultGroup?: string;
    readonly naming?: Partial<NamingConfig>;
    readonly includeTags?: readonly string[];
    readonly excludeTags?: readonly string[];
    readonly deprecated?: 'include' | 'skip';
    readonly dates?: DateMode;
    readonly debug?: DebugOption;
}
