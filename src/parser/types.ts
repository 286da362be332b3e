/**
 * Schema Graph Types
 *
 * Tagged representation of the JSON Schema subset understood by the
 * builder. Raw schema objects are normalized into these nodes by the
 * {@link normalizeSchema} pass; `$ref` pointers survive as `reference`
 * nodes so that cyclic graphs never have to be expanded eagerly.
 *
 * @module
 */

// ── Raw JSON ─────────────────────────────────────────────

/** A parsed JSON/YAML object of unknown shape. */
export type RawRecord = Readonly<Record<string, unknown>>;

/** Narrow an unknown value to a plain (non-array) object. */
export function isRecord(value: unknown): value is RawRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Schema Nodes ─────────────────────────────────────────

/** Primitive kinds a schema can map to directly. */
export type PrimitiveKind = 'string' | 'integer' | 'number' | 'boolean' | 'any';

interface SchemaNodeBase {
    /** JSON pointer of the raw schema this node came from */
    readonly location: string;
    readonly description?: string;
    readonly nullable: boolean;
    /** Present only when the schema declares a `default` */
    readonly default?: { readonly value: unknown };
}

export interface PrimitiveNode extends SchemaNodeBase {
    readonly kind: 'primitive';
    readonly primitive: PrimitiveKind;
    readonly format?: string;
    readonly enum?: readonly unknown[];
}

/** One declared property of an object node, in document order. */
export interface PropertyEntry {
    readonly name: string;
    readonly schema: SchemaNode;
}

export interface ObjectNode extends SchemaNodeBase {
    readonly kind: 'object';
    readonly title?: string;
    readonly properties: readonly PropertyEntry[];
    readonly required: ReadonlySet<string>;
    /** Schema of `additionalProperties`, when it is a schema or `true` */
    readonly additional?: SchemaNode;
}

export interface ArrayNode extends SchemaNodeBase {
    readonly kind: 'array';
    readonly items: SchemaNode;
}

/** Forward handle to another node, resolved on demand. */
export interface ReferenceNode extends SchemaNodeBase {
    readonly kind: 'reference';
    readonly pointer: string;
}

/** `allOf` composition; members merge left to right. */
export interface CompositeNode extends SchemaNodeBase {
    readonly kind: 'composite';
    readonly members: readonly SchemaNode[];
}

/** A construct outside the supported subset, kept as an untyped value. */
export interface OpaqueNode extends SchemaNodeBase {
    readonly kind: 'opaque';
    readonly construct: string;
    /** Every `$ref` found inside the degraded schema, still to be checked */
    readonly refs: readonly string[];
}

export type SchemaNode =
    | PrimitiveNode
    | ObjectNode
    | ArrayNode
    | ReferenceNode
    | CompositeNode
    | OpaqueNode;
