/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `openapi-client.yaml` from cwd or a specified path, validates
 * the structure, and merges with defaults.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { mergeConfig, type BuilderConfig, type PartialConfig } from './BuilderConfig.js';

// ── Filename Conventions ─────────────────────────────────

const CONFIG_FILENAMES = [
    'openapi-client.yaml',
    'openapi-client.yml',
    'openapi-client.json',
];

// ── File Shape ───────────────────────────────────────────

const fileConfigSchema = z.object({
    clientName: z.string().regex(/^[A-Za-z_$][\w$]*$/, 'must be a valid class name').optional(),
    defaultGroup: z.string().min(1).optional(),
    naming: z.object({
        style: z.enum(['camelCase', 'snake_case']).optional(),
    }).strict().optional(),
    includeTags: z.array(z.string()).optional(),
    excludeTags: z.array(z.string()).optional(),
    deprecated: z.enum(['include', 'skip']).optional(),
    dates: z.enum(['string', 'date']).optional(),
    debug: z.boolean().optional(),
}).strict();

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `openapi-client.yaml` in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @throws ConfigurationError when the explicit file is missing or the content is invalid
 */
export function loadConfig(configPath?: string, cwd?: string): BuilderConfig {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new ConfigurationError(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return mergeConfig({});
}

/**
 * Validate raw config data (as read from a file) and merge it with
 * defaults. An empty file counts as an empty config.
 *
 * @throws ConfigurationError listing every problem found
 */
export function parseConfig(raw: unknown, source = 'config'): BuilderConfig {
    const result = fileConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(issue =>
            `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
        );
        throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`);
    }
    return mergeConfig(toPartial(result.data));
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): BuilderConfig {
    const content = readFileSync(filePath, 'utf-8');

    let raw: unknown;
    try {
        raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`Could not parse "${filePath}": ${message}`);
    }
    return parseConfig(raw, `"${filePath}"`);
}

/** Drop keys zod left `undefined` so the result fits {@link PartialConfig}. */
function toPartial(data: z.infer<typeof fileConfigSchema>): PartialConfig {
    return {
        ...(data.clientName !== undefined ? { clientName: data.clientName } : {}),
        ...(data.defaultGroup !== undefined ? { defaultGroup: data.defaultGroup } : {}),
        ...(data.naming?.style !== undefined ? { naming: { style: data.naming.style } } : {}),
        ...(data.includeTags !== undefined ? { includeTags: data.includeTags } : {}),
        ...(data.excludeTags !== undefined ? { excludeTags: data.excludeTags } : {}),
        ...(data.deprecated !== undefined ? { deprecated: data.deprecated } : {}),
        ...(data.dates !== undefined ? { dates: data.dates } : {}),
        ...(data.debug !== undefined ? { debug: data.debug } : {}),
    };
}
