/**
 * OperationBinder — OpenAPI Operations → OperationDescriptors
 *
 * Extracts everything an invocation needs from one path + method:
 * parameters (path-level inherited, operation-level overriding by
 * name + location), the request body type, the response type and an
 * idiomatic method name.
 *
 * Binding is best-effort: malformed parameter declarations are skipped
 * (and reported), never fatal. Only unresolvable `$ref` pointers abort.
 *
 * Naming cascade:
 *   1. operationId → translated method name (absolute priority)
 *   2. Fallback: verb + last path segment (only if no operationId)
 *
 * @module
 */
import type { RefResolver } from '../parser/RefResolver.js';
import { escapePointer } from '../parser/SchemaNormalizer.js';
import { isRecord, type RawRecord } from '../parser/types.js';
import type { OpenApiDocument } from '../parser/DocumentLoader.js';
import { deduplicate, NameMap, translate, type MemberStyle } from '../naming/NamingTranslator.js';
import type { TypeSynthesizer } from '../schema/TypeSynthesizer.js';
import type { FieldType } from '../schema/types.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import type {
    BodyDescriptor, HttpMethod, OperationDescriptor,
    ParamDescriptor, ParamLocation, ResponseDescriptor,
} from './types.js';

// ── Types ────────────────────────────────────────────────

/** Shared state of one build, handed to every binding. */
export interface BinderContext {
    readonly resolver: RefResolver;
    readonly synthesizer: TypeSynthesizer;
    readonly style: MemberStyle;
    readonly defaultGroup: string;
    readonly observer?: DebugObserverFn;
}

/** Which operations {@link collectOperations} keeps. */
export interface OperationFilter {
    /** Only these groups (empty = all) */
    readonly includeTags?: readonly string[];
    readonly excludeTags?: readonly string[];
    readonly deprecated?: 'include' | 'skip';
}

/** A parameter declaration that survived validation, before typing. */
interface RawParam {
    readonly name: string;
    readonly location: ParamLocation;
    readonly required: boolean;
    readonly schema: unknown;
    readonly schemaLocation: string;
    readonly description?: string;
    readonly explode: boolean;
}

// ── Constants ────────────────────────────────────────────

const HTTP_METHODS: ReadonlyMap<string, HttpMethod> = new Map<string, HttpMethod>([
    ['get', 'GET'], ['post', 'POST'], ['put', 'PUT'], ['patch', 'PATCH'],
    ['delete', 'DELETE'], ['head', 'HEAD'], ['options', 'OPTIONS'], ['trace', 'TRACE'],
]);

const LOCATIONS: readonly ParamLocation[] = ['path', 'query', 'header', 'cookie'];

/** HTTP method → CRUD verb mapping */
const METHOD_TO_VERB: Readonly<Record<HttpMethod, string>> = {
    GET:     'list',
    POST:    'create',
    PUT:     'update',
    PATCH:   'update',
    DELETE:  'delete',
    HEAD:    'head',
    OPTIONS: 'options',
    TRACE:   'trace',
};

// ── Public API ───────────────────────────────────────────

/**
 * Walk `paths` in document order and bind every HTTP operation that
 * passes the filter.
 */
export function collectOperations(
    document: OpenApiDocument,
    ctx: BinderContext,
    filter: OperationFilter = {},
): OperationDescriptor[] {
    const operations: OperationDescriptor[] = [];
    const include = new Set(filter.includeTags ?? []);
    const exclude = new Set(filter.excludeTags ?? []);

    for (const [path, rawItem] of Object.entries(document.paths)) {
        const pathItem = ctx.resolver.resolveRaw(rawItem);
        if (!isRecord(pathItem)) {
            skip(ctx, `paths${path}`, 'path item is not an object');
            continue;
        }

        for (const [key, rawOperation] of Object.entries(pathItem)) {
            const method = HTTP_METHODS.get(key.toLowerCase());
            if (!method) continue;

            if (!isRecord(rawOperation)) {
                skip(ctx, `${method} ${path}`, 'operation is not an object');
                continue;
            }

            const group = groupOf(rawOperation, ctx.defaultGroup);
            if (rawOperation['deprecated'] === true && filter.deprecated === 'skip') continue;
            if (include.size > 0 && !include.has(group)) continue;
            if (exclude.has(group)) continue;

            operations.push(bindOperation(path, method, rawOperation, pathItem, ctx));
        }
    }

    return operations;
}

/**
 * Bind one operation.
 *
 * @param path - Path template, e.g. `/pets/{petId}`
 * @param method - HTTP method
 * @param operation - Raw operation object
 * @param pathItem - Raw path item (source of inherited parameters)
 */
export function bindOperation(
    path: string,
    method: HttpMethod,
    operation: RawRecord,
    pathItem: RawRecord,
    ctx: BinderContext,
): OperationDescriptor {
    const base = `#/paths/${escapePointer(path)}`;
    const operationId = stringField(operation, 'operationId');
    const name = translate(operationId ?? inferFromMethodAndPath(method, path), 'method', ctx.style);
    const typeHint = translate(operationId ?? `${method.toLowerCase()}_${path}`, 'type');

    const group = groupOf(operation, ctx.defaultGroup);

    // Merge path-level + operation-level params
    const merged = mergeParams(
        extractParams(pathItem['parameters'], `${base}/parameters`, ctx),
        extractParams(operation['parameters'], `${base}/${method.toLowerCase()}/parameters`, ctx),
    );

    const names = new NameMap();
    const used = new Set<string>();
    const params: ParamDescriptor[] = merged.map(param => {
        const argName = deduplicate(translate(param.name, 'parameter', ctx.style), used);
        used.add(argName);
        names.add(argName, param.name);
        return {
            name: param.name,
            argName,
            location: param.location,
            required: param.required,
            type: ctx.synthesizer.fieldType(
                ctx.resolver.normalize(param.schema, param.schemaLocation),
                `${typeHint}${translate(param.name, 'type')}`,
            ),
            explode: param.explode,
            ...(param.description !== undefined ? { description: param.description } : {}),
        };
    });

    const body = extractRequestBody(operation['requestBody'], `${base}/${method.toLowerCase()}/requestBody`, `${typeHint}Body`, used, names, ctx);
    const response = extractResponse(operation['responses'], `${base}/${method.toLowerCase()}/responses`, `${typeHint}Response`, ctx);

    const summary = stringField(operation, 'summary');
    const description = stringField(operation, 'description');

    return {
        ...(operationId !== undefined ? { operationId } : {}),
        name,
        method,
        path,
        group,
        ...(summary !== undefined ? { summary } : {}),
        ...(description !== undefined ? { description } : {}),
        deprecated: operation['deprecated'] === true,
        params,
        ...(body ? { body } : {}),
        ...(response ? { response } : {}),
        names,
    };
}

/**
 * Infer a name from HTTP method and path.
 *
 * @example
 * ('GET', '/pets')          → 'list_pets'
 * ('POST', '/pets')         → 'create_pets'
 * ('GET', '/pets/{petId}')  → 'get_pets'
 * ('DELETE', '/pets/{petId}') → 'delete_pets'
 */
export function inferFromMethodAndPath(method: HttpMethod, path: string): string {
    const allSegments = path.split('/').filter(s => s.length > 0);
    const segments = allSegments.filter(s => !s.startsWith('{'));
    const entity = segments[segments.length - 1] ?? 'resource';

    const endsWithParam = allSegments[allSegments.length - 1]?.startsWith('{') ?? false;
    const verb = method === 'GET' && endsWithParam ? 'get' : METHOD_TO_VERB[method];
    return `${verb}_${entity}`;
}

// ── Parameters ───────────────────────────────────────────

/** Extract parameters from a raw OpenAPI parameter list, skipping malformed entries. */
function extractParams(raw: unknown, location: string, ctx: BinderContext): RawParam[] {
    if (raw === undefined) return [];
    if (!Array.isArray(raw)) {
        skip(ctx, location, 'parameters is not a list');
        return [];
    }

    const params: RawParam[] = [];
    raw.forEach((entry: unknown, i: number) => {
        const entryLocation = `${location}/${i}`;
        const param = ctx.resolver.resolveRaw(entry);
        if (!isRecord(param)) {
            skip(ctx, entryLocation, 'parameter is not an object');
            return;
        }

        const name = stringField(param, 'name');
        const paramIn = LOCATIONS.find(l => l === param['in']);
        if (name === undefined || name.length === 0) {
            skip(ctx, entryLocation, 'parameter has no name');
            return;
        }
        if (!paramIn) {
            skip(ctx, entryLocation, `parameter "${name}" has unsupported location ${JSON.stringify(param['in'])}`);
            return;
        }

        const description = stringField(param, 'description');
        const { schema, schemaLocation } = parameterSchema(param, entryLocation);
        params.push({
            name,
            location: paramIn,
            // Path params are always required
            required: paramIn === 'path' || param['required'] === true,
            schema,
            schemaLocation,
            explode: param['explode'] !== false,
            ...(description !== undefined ? { description } : {}),
        });
    });
    return params;
}

/** `schema`, or the schema of the first `content` entry, or a string fallback. */
function parameterSchema(param: RawRecord, location: string): { schema: unknown; schemaLocation: string } {
    if (param['schema'] !== undefined) {
        return { schema: param['schema'], schemaLocation: `${location}/schema` };
    }
    const content = param['content'];
    if (isRecord(content)) {
        const [mediaType, media] = Object.entries(content)[0] ?? [];
        if (mediaType !== undefined && isRecord(media) && media['schema'] !== undefined) {
            return { schema: media['schema'], schemaLocation: `${location}/content/${escapePointer(mediaType)}/schema` };
        }
    }
    return { schema: { type: 'string' }, schemaLocation: `${location}/schema` };
}

/**
 * Merge path-level and operation-level params.
 * Operation params override path-level params by name + location.
 */
function mergeParams(pathParams: RawParam[], opParams: RawParam[]): RawParam[] {
    const opKeys = new Set(opParams.map(p => `${p.location}:${p.name}`));
    const unique = pathParams.filter(p => !opKeys.has(`${p.location}:${p.name}`));
    return [...unique, ...opParams];
}

// ── Body & Response ──────────────────────────────────────

function extractRequestBody(
    raw: unknown,
    location: string,
    typeHint: string,
    used: Set<string>,
    names: NameMap,
    ctx: BinderContext,
): BodyDescriptor | undefined {
    const body = ctx.resolver.resolveRaw(raw);
    if (body === undefined) return undefined;
    if (!isRecord(body)) {
        skip(ctx, location, 'requestBody is not an object');
        return undefined;
    }

    const media = pickMedia(body['content']);
    if (!media) return undefined;

    const argName = deduplicate('body', used);
    used.add(argName);
    names.add(argName, 'body');

    const description = stringField(body, 'description');
    return {
        argName,
        mediaType: media.mediaType,
        required: body['required'] === true,
        type: schemaType(media.schema, `${location}/content/${escapePointer(media.mediaType)}/schema`, typeHint, ctx),
        ...(description !== undefined ? { description } : {}),
    };
}

/** First 2xx response whose content declares a schema, else `default`. */
function extractResponse(raw: unknown, location: string, typeHint: string, ctx: BinderContext): ResponseDescriptor | undefined {
    if (!isRecord(raw)) return undefined;

    const statuses = Object.keys(raw);
    const candidates = [...statuses.filter(s => /^2(\d\d|XX)$/i.test(s)), ...statuses.filter(s => s === 'default')];

    for (const status of candidates) {
        const response = ctx.resolver.resolveRaw(raw[status]);
        if (!isRecord(response)) continue;

        const media = pickMedia(response['content']);
        if (!media || media.schema === undefined) continue;

        return {
            status,
            mediaType: media.mediaType,
            type: schemaType(media.schema, `${location}/${escapePointer(status)}/content/${escapePointer(media.mediaType)}/schema`, typeHint, ctx),
        };
    }
    return undefined;
}

/**
 * Pick the media type to use from a `content` map:
 * `application/json`, then any `+json` / `json` type, then the first one.
 */
function pickMedia(content: unknown): { mediaType: string; schema: unknown } | undefined {
    if (!isRecord(content)) return undefined;

    const types = Object.keys(content);
    const mediaType = types.find(t => t === 'application/json')
        ?? types.find(t => /json/i.test(t))
        ?? types[0];
    if (mediaType === undefined) return undefined;

    const media = content[mediaType];
    return { mediaType, schema: isRecord(media) ? media['schema'] : undefined };
}

function schemaType(schema: unknown, location: string, typeHint: string, ctx: BinderContext): FieldType {
    if (schema === undefined) return { kind: 'primitive', primitive: 'any' };
    return ctx.synthesizer.fieldType(ctx.resolver.normalize(schema, location), typeHint);
}

// ── Helpers ──────────────────────────────────────────────

/** First tag of the operation, or the default group. */
function groupOf(operation: RawRecord, defaultGroup: string): string {
    const tags = operation['tags'];
    const firstTag: unknown = Array.isArray(tags) ? tags[0] : undefined;
    return typeof firstTag === 'string' && firstTag.length > 0 ? firstTag : defaultGroup;
}

function stringField(raw: RawRecord, key: string): string | undefined {
    const value = raw[key];
    return typeof value === 'string' ? value : undefined;
}

function skip(ctx: BinderContext, location: string, reason: string): void {
    ctx.observer?.({ type: 'skip', location, reason, timestamp: Date.now() });
}
