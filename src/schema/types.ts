/**
 * Type Descriptor Types
 *
 * Synthesized, document-independent descriptions of data shapes. Once a
 * build finishes every descriptor is frozen; descriptors hold no pointer
 * back into the source document.
 *
 * @module
 */
import type { PrimitiveKind } from '../parser/types.js';
import type { ReadonlyNameMap } from '../naming/NamingTranslator.js';

/** The type of one field, parameter, body or response. */
export type FieldType =
    | { readonly kind: 'primitive'; readonly primitive: PrimitiveKind; readonly format?: string; readonly enum?: readonly unknown[] }
    | { readonly kind: 'type'; readonly descriptor: TypeDescriptor }
    | { readonly kind: 'array'; readonly items: FieldType }
    | { readonly kind: 'map'; readonly values: FieldType }
    | { readonly kind: 'opaque'; readonly construct: string };

export interface FieldDescriptor {
    /** Idiomatic name the field is exposed under */
    readonly name: string;
    /** Name of the field in the document and on the wire */
    readonly originalName: string;
    readonly type: FieldType;
    readonly required: boolean;
    readonly nullable: boolean;
    readonly description?: string;
    /** Present only when the schema declares a default */
    readonly default?: { readonly value: unknown };
}

/** A constructible data shape. */
export interface TypeDescriptor {
    /** Name installed into the target namespace */
    readonly name: string;
    /** Name as written in the document (component key or inline path) */
    readonly sourceName: string;
    readonly description?: string;
    /** Fields in declaration order (allOf members merged, last wins) */
    readonly fields: readonly FieldDescriptor[];
    /** Translated ↔ original field names */
    readonly names: ReadonlyNameMap;
}

/** Human-readable rendering of a field type, e.g. `Pet[]`, `Record<string, integer>`. */
export function describeFieldType(type: FieldType): string {
    switch (type.kind) {
        case 'primitive':
            return type.format ? `${type.primitive}<${type.format}>` : type.primitive;
        case 'type':
            return type.descriptor.name;
        case 'array':
            return `${describeFieldType(type.items)}[]`;
        case 'map':
            return `Record<string, ${describeFieldType(type.values)}>`;
        case 'opaque':
            return 'unknown';
    }
}
