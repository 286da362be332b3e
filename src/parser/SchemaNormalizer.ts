/**
 * SchemaNormalizer — Raw JSON Schema → Tagged SchemaNode
 *
 * Converts one raw schema object (and its inline children) into the
 * tagged {@link SchemaNode} representation. `$ref` pointers are NOT
 * followed here: they become `reference` nodes that the
 * {@link RefResolver} dereferences on demand.
 *
 * Constructs outside the supported subset never fail the build; they
 * become `opaque` nodes and are reported through `onDegrade`.
 *
 * @module
 */
import { UnsupportedSchemaConstructError } from '../errors.js';
import { isRecord, type PrimitiveKind, type PropertyEntry, type RawRecord, type SchemaNode } from './types.js';

/** Receives constructs that were degraded to opaque nodes. */
export type DegradeHandler = (error: UnsupportedSchemaConstructError) => void;

const PRIMITIVE_TYPES: readonly PrimitiveKind[] = ['string', 'integer', 'number', 'boolean'];

/** Keywords that change the meaning of a schema in ways we cannot type. */
const UNSUPPORTED_KEYWORDS = ['not', 'if', 'then', 'else', 'discriminator'] as const;

// ── Public API ───────────────────────────────────────────

/**
 * Normalize a raw schema.
 *
 * @param raw - Raw schema value (object, or a JSON Schema boolean)
 * @param location - JSON pointer of `raw`, used for diagnostics and naming
 * @param onDegrade - Called for every construct turned opaque
 */
export function normalizeSchema(raw: unknown, location: string, onDegrade?: DegradeHandler): SchemaNode {
    if (raw === true) {
        return { kind: 'primitive', primitive: 'any', location, nullable: true };
    }
    if (!isRecord(raw)) {
        return degrade(location, raw === false ? 'false-schema' : 'non-object-schema', onDegrade);
    }

    const ref = raw['$ref'];
    if (typeof ref === 'string') {
        return { kind: 'reference', pointer: ref, location, nullable: raw['nullable'] === true };
    }

    for (const keyword of UNSUPPORTED_KEYWORDS) {
        if (keyword in raw) {
            return degrade(location, keyword, onDegrade, raw);
        }
    }

    if (Array.isArray(raw['allOf'])) {
        return normalizeAllOf(raw, raw['allOf'], location, onDegrade);
    }

    for (const keyword of ['oneOf', 'anyOf'] as const) {
        const members = raw[keyword];
        if (Array.isArray(members)) {
            return normalizeUnion(raw, keyword, members, location, onDegrade);
        }
    }

    const typeInfo = readType(raw['type']);
    if (typeInfo === undefined) {
        return degrade(location, `type:${JSON.stringify(raw['type'])}`, onDegrade, raw);
    }

    const nullable = typeInfo.nullable || raw['nullable'] === true;
    const type = typeInfo.type ?? inferType(raw);

    if (type === 'object') {
        return normalizeObject(raw, location, nullable, onDegrade);
    }

    if (type === 'array') {
        return {
            kind: 'array',
            items: normalizeSchema(raw['items'] ?? {}, `${location}/items`, onDegrade),
            location,
            nullable,
            ...common(raw),
        };
    }

    if (type === 'null' || type === 'any') {
        return { kind: 'primitive', primitive: 'any', location, nullable: true, ...common(raw) };
    }

    const primitive = PRIMITIVE_TYPES.find(kind => kind === type);
    if (primitive) {
        const format = raw['format'];
        const values = raw['enum'];
        return {
            kind: 'primitive',
            primitive,
            location,
            nullable,
            ...common(raw),
            ...(typeof format === 'string' ? { format } : {}),
            ...(Array.isArray(values) ? { enum: Object.freeze([...values]) } : {}),
        };
    }

    return degrade(location, `type:${type}`, onDegrade, raw);
}

// ── Helpers ──────────────────────────────────────────────

function normalizeObject(raw: RawRecord, location: string, nullable: boolean, onDegrade?: DegradeHandler): SchemaNode {
    const properties: PropertyEntry[] = [];
    const rawProperties = raw['properties'];
    if (isRecord(rawProperties)) {
        for (const [name, schema] of Object.entries(rawProperties)) {
            properties.push({
                name,
                schema: normalizeSchema(schema, `${location}/properties/${escapePointer(name)}`, onDegrade),
            });
        }
    }

    const required = Array.isArray(raw['required'])
        ? raw['required'].filter((name): name is string => typeof name === 'string')
        : [];

    const rawAdditional = raw['additionalProperties'];
    const additional = rawAdditional === true || isRecord(rawAdditional)
        ? normalizeSchema(rawAdditional, `${location}/additionalProperties`, onDegrade)
        : undefined;

    const title = raw['title'];
    return {
        kind: 'object',
        properties,
        required: new Set(required),
        location,
        nullable,
        ...common(raw),
        ...(typeof title === 'string' ? { title } : {}),
        ...(additional ? { additional } : {}),
    };
}

/**
 * `allOf` members merge in order. Sibling `properties` declared next to
 * the `allOf` act as a last member, so they win on collisions.
 */
function normalizeAllOf(raw: RawRecord, members: readonly unknown[], location: string, onDegrade?: DegradeHandler): SchemaNode {
    const nodes = members.map((member, i) => normalizeSchema(member, `${location}/allOf/${i}`, onDegrade));

    if (isRecord(raw['properties']) || Array.isArray(raw['required'])) {
        nodes.push(normalizeObject(raw, location, false, onDegrade));
    }

    return {
        kind: 'composite',
        members: nodes,
        location,
        nullable: raw['nullable'] === true,
        ...common(raw),
    };
}

/**
 * `oneOf` / `anyOf` are supported only when they reduce to a single
 * member once `{ type: 'null' }` alternatives are removed.
 */
function normalizeUnion(
    raw: RawRecord,
    keyword: 'oneOf' | 'anyOf',
    members: readonly unknown[],
    location: string,
    onDegrade?: DegradeHandler,
): SchemaNode {
    const nonNull = members
        .map((member, i) => ({ member, i }))
        .filter(({ member }) => !(isRecord(member) && member['type'] === 'null'));

    const single = nonNull.length === 1 ? nonNull[0] : undefined;
    if (!single) {
        return degrade(location, keyword, onDegrade, raw);
    }

    const node = normalizeSchema(single.member, `${location}/${keyword}/${single.i}`, onDegrade);
    const nullable = nonNull.length < members.length || raw['nullable'] === true;
    return nullable ? { ...node, nullable: true } : node;
}

/** Read `type`, accepting the 3.1 array form with an optional `null`. */
function readType(value: unknown): { type?: string; nullable: boolean } | undefined {
    if (value === undefined) return { nullable: false };
    if (typeof value === 'string') return { type: value, nullable: false };
    if (!Array.isArray(value) || !value.every((t): t is string => typeof t === 'string')) return undefined;

    const nonNull = value.filter(t => t !== 'null');
    const nullable = nonNull.length < value.length;
    if (nonNull.length === 0) return { type: 'null', nullable: true };
    if (nonNull.length === 1) return { type: nonNull[0] ?? 'any', nullable };
    return undefined;
}

/** Infer a type for schemas that omit `type`. */
function inferType(raw: RawRecord): string {
    if ('properties' in raw || 'additionalProperties' in raw) return 'object';
    if ('items' in raw) return 'array';
    return 'any';
}

function common(raw: RawRecord): { description?: string; default?: { value: unknown } } {
    const description = raw['description'];
    return {
        ...(typeof description === 'string' ? { description } : {}),
        ...('default' in raw ? { default: { value: raw['default'] } } : {}),
    };
}

function degrade(location: string, construct: string, onDegrade?: DegradeHandler, raw?: RawRecord): SchemaNode {
    onDegrade?.(new UnsupportedSchemaConstructError(location, construct));
    return {
        kind: 'opaque',
        construct,
        location,
        nullable: true,
        refs: raw ? collectRefs(raw) : [],
        ...(raw ? common(raw) : {}),
    };
}

/** `$ref` strings anywhere under `value`, in document order. */
export function collectRefs(value: unknown, found: string[] = [], seen = new Set<object>()): string[] {
    if (typeof value !== 'object' || value === null || seen.has(value)) return found;
    seen.add(value);

    if (Array.isArray(value)) {
        for (const item of value) collectRefs(item, found, seen);
        return found;
    }
    if (!isRecord(value)) return found;

    for (const [key, child] of Object.entries(value)) {
        if (key === '$ref' && typeof child === 'string') {
            found.push(child);
        } else {
            collectRefs(child, found, seen);
        }
    }
    return found;
}

/** Escape a single JSON pointer segment. */
export function escapePointer(segment: string): string {
    return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}
