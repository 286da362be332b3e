/**
 * RefResolver — JSON $ref Pointer Resolution
 *
 * Resolves `$ref` pointers against one OpenAPI document without
 * mutating it. Every pointer is looked up and normalized at most once:
 * the pointer-keyed cache guarantees that two uses of the same `$ref`
 * resolve to the same {@link SchemaNode} identity, which is what lets
 * the type synthesizer close cycles instead of duplicating types.
 *
 * Only one level of indirection is removed per node. References nested
 * inside the returned node stay as `reference` forward handles.
 *
 * A resolver instance belongs to a single build pass and is not meant
 * to be shared between concurrent builds.
 *
 * @module
 */
import { UnresolvedReferenceError } from '../errors.js';
import { normalizeSchema, type DegradeHandler } from './SchemaNormalizer.js';
import { isRecord, type RawRecord, type SchemaNode } from './types.js';

// ── Resolver ─────────────────────────────────────────────

export class RefResolver {
    private readonly cache = new Map<string, SchemaNode>();

    constructor(
        private readonly document: RawRecord,
        private readonly onDegrade?: DegradeHandler,
    ) {}

    /**
     * Dereference a node or a pointer string.
     *
     * Chains of pure aliases (`A: { $ref: B }`) are followed until a
     * concrete node is reached.
     *
     * @throws UnresolvedReferenceError when a pointer does not exist,
     *         is not local, or the alias chain loops back on itself
     */
    resolve(target: SchemaNode | string): SchemaNode {
        let node = typeof target === 'string' ? this.lookupSchema(target) : target;
        const seen = new Set<string>(typeof target === 'string' ? [target] : []);

        while (node.kind === 'reference') {
            if (seen.has(node.pointer)) {
                throw new UnresolvedReferenceError(node.pointer, 'circular alias chain');
            }
            seen.add(node.pointer);
            node = this.lookupSchema(node.pointer);
        }

        return node;
    }

    /**
     * Follow `$ref` on a non-schema object (parameter, request body,
     * response). Returns the raw value; non-reference values pass through.
     */
    resolveRaw(value: unknown): unknown {
        let current = value;
        const seen = new Set<string>();

        while (isRecord(current)) {
            const pointer = current['$ref'];
            if (typeof pointer !== 'string') break;
            if (seen.has(pointer)) {
                throw new UnresolvedReferenceError(pointer, 'circular alias chain');
            }
            seen.add(pointer);
            current = this.lookupRaw(pointer);
        }

        return current;
    }

    /**
     * Check that a pointer exists without normalizing its target.
     *
     * @throws UnresolvedReferenceError when it does not
     */
    assertResolvable(pointer: string): void {
        this.lookupRaw(pointer);
    }

    /** Normalize an inline (non-`$ref`) schema found at `location`. */
    normalize(raw: unknown, location: string): SchemaNode {
        return normalizeSchema(raw, location, this.onDegrade);
    }

    /** Number of distinct pointers resolved so far. */
    get size(): number {
        return this.cache.size;
    }

    // ── Internal ─────────────────────────────────────────

    private lookupSchema(pointer: string): SchemaNode {
        const cached = this.cache.get(pointer);
        if (cached) return cached;

        const node = normalizeSchema(this.lookupRaw(pointer), pointer, this.onDegrade);
        this.cache.set(pointer, node);
        return node;
    }

    private lookupRaw(pointer: string): unknown {
        const value = lookupPointer(this.document, pointer);
        if (value === undefined) {
            throw new UnresolvedReferenceError(pointer);
        }
        return value;
    }
}

// ── Pointer Lookup ───────────────────────────────────────

/**
 * Lookup a JSON pointer path (e.g. `#/components/schemas/Pet`) in the doc.
 *
 * @param root - Root document
 * @param pointer - Local pointer starting with `#`
 * @returns The referenced value, or `undefined` if not found
 * @throws UnresolvedReferenceError for non-local pointers
 */
export function lookupPointer(root: RawRecord, pointer: string): unknown {
    if (pointer === '#') return root;
    if (!pointer.startsWith('#/')) {
        throw new UnresolvedReferenceError(pointer, 'only local "#/..." pointers are supported');
    }

    let current: unknown = root;
    for (const segment of pointer.slice(2).split('/').map(decodeSegment)) {
        if (Array.isArray(current)) {
            if (!/^(0|[1-9]\d*)$/.test(segment)) return undefined;
            current = current[Number(segment)];
            continue;
        }
        if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
            return undefined;
        }
        current = current[segment];
    }

    return current;
}

/** Percent-decode, then undo `~1` → `/` and `~0` → `~`. */
function decodeSegment(segment: string): string {
    return percentDecode(segment).replace(/~1/g, '/').replace(/~0/g, '~');
}

function percentDecode(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        return segment;
    }
}
