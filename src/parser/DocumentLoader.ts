/**
 * DocumentLoader — Schema Document Intake
 *
 * Accepts YAML or JSON text, a local file path, a URL, or a pre-parsed
 * object, and returns a shape-checked {@link OpenApiDocument}. Retrieval
 * is a thin I/O wrapper; the build itself only ever sees the parsed
 * structure.
 *
 * @module
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { InvalidDocumentError } from '../errors.js';
import { isRecord } from './types.js';

// ── Document Shape ───────────────────────────────────────

const versionString = z.union([z.string(), z.number()]).transform(String);

const documentSchema = z.object({
    openapi: versionString.refine(v => v.startsWith('3.'), {
        message: 'OpenAPI 3.x required',
    }),
    info: z.object({
        title: z.string().optional(),
        version: versionString.optional(),
        description: z.string().optional(),
    }).passthrough(),
    paths: z.record(z.string(), z.unknown()),
    servers: z.array(z.unknown()).optional(),
    tags: z.array(z.unknown()).optional(),
    components: z.record(z.string(), z.unknown()).optional(),
}).passthrough();

/** A parsed OpenAPI 3.x document (top level checked, the rest untyped). */
export type OpenApiDocument = z.infer<typeof documentSchema>;

/** A server entry with its `{variable}` defaults. */
export interface ServerInfo {
    readonly url: string;
    readonly description?: string;
    readonly variables: Readonly<Record<string, string>>;
}

// ── Public API ───────────────────────────────────────────

/**
 * Check that a value is an OpenAPI 3.x document.
 *
 * @throws InvalidDocumentError listing every shape problem found
 */
export function assertOpenApiDocument(value: unknown): OpenApiDocument {
    const result = documentSchema.safeParse(value);
    if (!result.success) {
        const issues = result.error.issues.map(issue =>
            `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
        );
        throw new InvalidDocumentError('Invalid OpenAPI document', issues);
    }
    return result.data;
}

/** Parse YAML or JSON text into a checked document. */
export function parseDocument(text: string): OpenApiDocument {
    return assertOpenApiDocument(parseText(text));
}

/** Read and parse a YAML/JSON document from disk. */
export async function readDocumentFile(filePath: string): Promise<OpenApiDocument> {
    const content = await readFile(filePath, 'utf-8');
    return parseDocument(content);
}

/**
 * Download and parse a document.
 *
 * @param fetchFn - Custom fetch function (default: globalThis.fetch)
 * @throws InvalidDocumentError on a non-2xx answer
 */
export async function fetchDocument(url: string, fetchFn: typeof fetch = globalThis.fetch): Promise<OpenApiDocument> {
    const response = await fetchFn(url);
    if (!response.ok) {
        throw new InvalidDocumentError(`Could not fetch "${url}": HTTP ${response.status}`);
    }
    return parseDocument(await response.text());
}

/** Options for {@link loadDocument}. */
export interface LoadDocumentOptions {
    /** Custom fetch function for URL sources */
    readonly fetchFn?: typeof fetch;
    /** Base directory for relative file paths (default: process.cwd()) */
    readonly cwd?: string;
}

/**
 * Load a document from any supported source:
 *   1. pre-parsed object
 *   2. `http://` / `https://` URL
 *   3. path of an existing file
 *   4. inline YAML/JSON text
 */
export async function loadDocument(source: string | object, options: LoadDocumentOptions = {}): Promise<OpenApiDocument> {
    if (typeof source !== 'string') {
        return assertOpenApiDocument(source);
    }

    if (/^https?:\/\//i.test(source)) {
        return fetchDocument(source, options.fetchFn);
    }

    if (!source.includes('\n')) {
        const filePath = resolve(options.cwd ?? process.cwd(), source);
        if (existsSync(filePath)) {
            return readDocumentFile(filePath);
        }
    }

    return parseDocument(source);
}

/**
 * Extract the `servers` list, keeping each variable's declared default.
 * Entries without a string `url` are ignored.
 */
export function extractServers(document: OpenApiDocument): ServerInfo[] {
    const servers: ServerInfo[] = [];
    for (const entry of document.servers ?? []) {
        if (!isRecord(entry)) continue;
        const url = entry['url'];
        if (typeof url !== 'string') continue;

        const variables: Record<string, string> = {};
        const rawVariables = entry['variables'];
        if (isRecord(rawVariables)) {
            for (const [name, variable] of Object.entries(rawVariables)) {
                if (isRecord(variable) && variable['default'] !== undefined) {
                    variables[name] = String(variable['default']);
                }
            }
        }

        const description = entry['description'];
        servers.push({
            url,
            ...(typeof description === 'string' ? { description } : {}),
            variables,
        });
    }
    return servers;
}

// ── Helpers ──────────────────────────────────────────────

/** Parse YAML or JSON string input */
function parseText(text: string): unknown {
    const trimmed = text.trim();

    // Try JSON first (much faster)
    if (trimmed.startsWith('{')) {
        const json = tryParseJson(trimmed);
        if (json.ok) return json.value;
    }

    // Parse as YAML (supports JSON as well)
    try {
        return parseYaml(trimmed);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new InvalidDocumentError(`Could not parse document: ${message}`);
    }
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch {
        return { ok: false };
    }
}
