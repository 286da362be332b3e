/**
 * TypeSynthesizer — SchemaNode Graph → TypeDescriptors
 *
 * Walks object and `allOf` nodes and produces one {@link TypeDescriptor}
 * per distinct node. The memo is keyed by node identity, which the
 * {@link RefResolver} cache makes stable per pointer: a descriptor is
 * registered BEFORE its fields are walked, so a field that refers back
 * to its own type (directly or through other types) receives the very
 * same descriptor instance.
 *
 * Unsupported constructs never abort synthesis; they surface as
 * `opaque` field types.
 *
 * @module
 */
import { UnresolvedReferenceError, UnsupportedSchemaConstructError } from '../errors.js';
import { escapePointer, type DegradeHandler } from '../parser/SchemaNormalizer.js';
import type { RefResolver } from '../parser/RefResolver.js';
import type { CompositeNode, ObjectNode, SchemaNode } from '../parser/types.js';
import { deduplicate, NameMap, translate, type MemberStyle } from '../naming/NamingTranslator.js';
import type { FieldDescriptor, FieldType, TypeDescriptor } from './types.js';

// ── Types ────────────────────────────────────────────────

export interface SynthesizerOptions {
    /** Casing of field names (default: camelCase) */
    readonly style?: MemberStyle;
    readonly onDegrade?: DegradeHandler;
}

/** A property collected from an object node or merged across `allOf` members. */
interface CollectedProperty {
    readonly schema: SchemaNode;
    readonly required: boolean;
}

const COMPONENT_PREFIX = '#/components/schemas/';

// ── Synthesizer ──────────────────────────────────────────

export class TypeSynthesizer {
    private readonly memo = new Map<SchemaNode, TypeDescriptor>();
    private readonly created: TypeDescriptor[] = [];
    private readonly usedNames = new Set<string>();
    /** Names reserved for components, keyed by component pointer */
    private readonly componentNames = new Map<string, string>();
    /** Non-type nodes currently being expanded (array/alias cycles) */
    private readonly expanding = new Set<SchemaNode>();
    private readonly style: MemberStyle;

    constructor(
        private readonly resolver: RefResolver,
        private readonly options: SynthesizerOptions = {},
    ) {
        this.style = options.style ?? 'camelCase';
    }

    /**
     * Synthesize every schema under `components.schemas`, in document
     * order. Component names are reserved first so that inline types
     * never take a component's name. Components that are not object
     * types (arrays, maps, aliases) are still walked, so every `$ref`
     * below them is checked.
     */
    synthesizeComponents(schemaNames: readonly string[]): void {
        const components: Array<{ node: SchemaNode; name: string }> = [];

        for (const name of schemaNames) {
            const pointer = `${COMPONENT_PREFIX}${escapePointer(name)}`;
            const node = this.resolver.resolve(pointer);
            components.push({ node, name });
            if (!isTypeNode(node) || node.location !== pointer) continue;

            const translated = deduplicate(translate(name, 'type'), this.usedNames);
            this.usedNames.add(translated);
            this.componentNames.set(pointer, translated);
        }

        for (const { node, name } of components) {
            if (isTypeNode(node) && this.componentNames.has(node.location)) {
                this.synthesize(node, name);
            } else {
                this.fieldType(node, name);
            }
        }
    }

    /**
     * Synthesize (or fetch from the memo) the descriptor of an object or
     * `allOf` node.
     *
     * @param node - Resolved object/composite node
     * @param nameHint - Source name used when the node has no reserved name
     */
    synthesize(node: ObjectNode | CompositeNode, nameHint: string): TypeDescriptor {
        const cached = this.memo.get(node);
        if (cached) return cached;

        const name = this.nameFor(node, nameHint);
        const fields: FieldDescriptor[] = [];
        const names = new NameMap();
        const descriptor: TypeDescriptor = {
            name,
            sourceName: nameHint,
            ...(node.description !== undefined ? { description: node.description } : {}),
            fields,
            names,
        };

        // Register before walking fields: closes self-referential cycles
        this.memo.set(node, descriptor);
        this.created.push(descriptor);

        for (const [original, property] of this.collectProperties(node, new Set())) {
            const fieldName = names.register(original, 'field', this.style);
            const target = this.resolver.resolve(property.schema);
            const fieldDefault = property.schema.default ?? target.default;
            const description = property.schema.description ?? target.description;

            fields.push({
                name: fieldName,
                originalName: original,
                type: this.fieldType(property.schema, `${name}${translate(original, 'type')}`),
                required: property.required,
                nullable: property.schema.nullable || target.nullable,
                ...(description !== undefined ? { description } : {}),
                ...(fieldDefault !== undefined ? { default: fieldDefault } : {}),
            });
        }

        return descriptor;
    }

    /**
     * Map any node to a field type, synthesizing nested types on the way.
     *
     * @param nameHint - Name for an inline object type found under `node`
     */
    fieldType(node: SchemaNode, nameHint: string): FieldType {
        const resolved = this.resolver.resolve(node);
        const hint = node.kind === 'reference' ? componentName(node.pointer) ?? nameHint : nameHint;

        switch (resolved.kind) {
            case 'primitive':
                return {
                    kind: 'primitive',
                    primitive: resolved.primitive,
                    ...(resolved.format !== undefined ? { format: resolved.format } : {}),
                    ...(resolved.enum !== undefined ? { enum: resolved.enum } : {}),
                };

            case 'opaque':
                for (const pointer of resolved.refs) this.resolver.assertResolvable(pointer);
                return { kind: 'opaque', construct: resolved.construct };

            case 'array':
                return this.expand(resolved, () => ({
                    kind: 'array',
                    items: this.fieldType(resolved.items, `${hint}Item`),
                }));

            case 'object':
                if (resolved.properties.length === 0) {
                    const values = resolved.additional;
                    return this.expand(resolved, () => ({
                        kind: 'map',
                        values: values
                            ? this.fieldType(values, `${hint}Value`)
                            : { kind: 'primitive', primitive: 'any' },
                    }));
                }
                return { kind: 'type', descriptor: this.synthesize(resolved, hint) };

            case 'composite': {
                // A single-member allOf is an alias, unless it is a component of its own
                const only = resolved.members.length === 1 ? resolved.members[0] : undefined;
                if (only && !this.componentNames.has(resolved.location)) {
                    return this.expand(resolved, () => this.fieldType(only, hint));
                }
                return { kind: 'type', descriptor: this.synthesize(resolved, hint) };
            }

            case 'reference':
                throw new UnresolvedReferenceError(resolved.pointer, 'reference left after resolution');
        }
    }

    /** Every descriptor created so far, in creation order (a copy). */
    types(): readonly TypeDescriptor[] {
        return [...this.created];
    }

    /** Freeze every descriptor; called once the build is complete. */
    freeze(): void {
        for (const descriptor of this.created) {
            for (const field of descriptor.fields) {
                deepFreeze(field.type);
                Object.freeze(field);
            }
            Object.freeze(descriptor.fields);
            if (descriptor.names instanceof NameMap) descriptor.names.freeze();
            Object.freeze(descriptor);
        }
    }

    // ── Internal ─────────────────────────────────────────

    private nameFor(node: ObjectNode | CompositeNode, nameHint: string): string {
        const reserved = this.componentNames.get(node.location);
        if (reserved !== undefined) return reserved;

        const title = node.kind === 'object' ? node.title : undefined;
        const name = deduplicate(translate(title ?? nameHint, 'type'), this.usedNames);
        this.usedNames.add(name);
        return name;
    }

    /**
     * Ordered property map of an object node, or of all `allOf` members
     * merged left to right. Later members override earlier ones (last
     * wins); `required` accumulates.
     */
    private collectProperties(node: SchemaNode, visiting: Set<SchemaNode>): Map<string, CollectedProperty> {
        const merged = new Map<string, CollectedProperty>();
        if (visiting.has(node)) {
            this.options.onDegrade?.(new UnsupportedSchemaConstructError(node.location, 'allOf:cycle'));
            return merged;
        }
        visiting.add(node);

        if (node.kind === 'object') {
            for (const { name, schema } of node.properties) {
                merged.set(name, { schema, required: node.required.has(name) });
            }
        } else if (node.kind === 'composite') {
            for (const member of node.members) {
                const resolved = this.resolver.resolve(member);
                if (resolved.kind !== 'object' && resolved.kind !== 'composite') {
                    this.options.onDegrade?.(new UnsupportedSchemaConstructError(member.location, `allOf:${resolved.kind}`));
                    continue;
                }
                for (const [name, property] of this.collectProperties(resolved, visiting)) {
                    const previous = merged.get(name);
                    merged.set(name, {
                        schema: property.schema,
                        required: property.required || (previous?.required ?? false),
                    });
                }
            }
        }

        visiting.delete(node);
        return merged;
    }

    /** Guard against array and alias cycles that never pass through a type. */
    private expand(node: SchemaNode, build: () => FieldType): FieldType {
        if (this.expanding.has(node)) {
            this.options.onDegrade?.(new UnsupportedSchemaConstructError(node.location, 'recursive-alias'));
            return { kind: 'opaque', construct: 'recursive-alias' };
        }
        this.expanding.add(node);
        try {
            return build();
        } finally {
            this.expanding.delete(node);
        }
    }
}

// ── Helpers ──────────────────────────────────────────────

function isTypeNode(node: SchemaNode): node is ObjectNode | CompositeNode {
    return (node.kind === 'object' && node.properties.length > 0) || node.kind === 'composite';
}

/** Component key of a `#/components/schemas/<Name>` pointer. */
function componentName(pointer: string): string | undefined {
    if (!pointer.startsWith(COMPONENT_PREFIX)) return undefined;
    const rest = pointer.slice(COMPONENT_PREFIX.length);
    return rest.includes('/') ? undefined : rest.replace(/~1/g, '/').replace(/~0/g, '~');
}

function deepFreeze(type: FieldType): void {
    if (Object.isFrozen(type)) return;
    Object.freeze(type);
    if (type.kind === 'array') deepFreeze(type.items);
    if (type.kind === 'map') deepFreeze(type.values);
}
