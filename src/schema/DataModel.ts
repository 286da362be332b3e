/**
 * DataModel — Runtime Classes for Synthesized Types
 *
 * Every {@link TypeDescriptor} becomes one class, created on demand by a
 * {@link ModelRegistry} and cached by descriptor identity. Instances are
 * constructed from a mapping keyed by the ORIGINAL schema field names and
 * expose the fields under their translated names:
 *
 * ```typescript
 * const pet = new Pet({ pet_id: 7, 'display-name': 'Rex' });
 * pet.petId;        // 7
 * pet.displayName;  // 'Rex'
 * pet.serialize();  // { pet_id: 7, 'display-name': 'Rex' }
 * ```
 *
 * No validation happens: values are stored as given, except that nested
 * mappings are turned into nested model instances and, when the registry
 * is created with `dates: 'date'`, `date-time` strings into `Date`s.
 *
 * @module
 */
import { isRecord } from '../parser/types.js';
import type { FieldType, TypeDescriptor } from './types.js';

// ── Types ────────────────────────────────────────────────

/** Constructor input: original field name → value. */
export type ModelData = Readonly<Record<string, unknown>>;

/** The class synthesized for one descriptor. */
export interface ModelClass {
    new (data?: ModelData): DataModel;
    readonly descriptor: TypeDescriptor;
}

/** How `format: date-time` strings are hydrated. */
export type DateMode = 'string' | 'date';

export interface ModelRegistryOptions {
    /** `'date'` turns `date-time` strings into `Date` instances (default: `'string'`) */
    readonly dates?: DateMode;
}

interface ModelState {
    readonly descriptor: TypeDescriptor;
    readonly registry: ModelRegistry;
    /** Translated names of the fields supplied at construction */
    readonly present: ReadonlySet<string>;
}

const states = new WeakMap<DataModel, ModelState>();

// ── Base Class ───────────────────────────────────────────

export abstract class DataModel {
    [field: string]: unknown;

    protected constructor(descriptor: TypeDescriptor, registry: ModelRegistry, data: ModelData) {
        const present = new Set<string>();

        for (const field of descriptor.fields) {
            if (Object.prototype.hasOwnProperty.call(data, field.originalName)) {
                present.add(field.name);
                this[field.name] = registry.hydrate(data[field.originalName], field.type);
            } else {
                this[field.name] = field.default !== undefined
                    ? registry.hydrate(structuredClone(field.default.value), field.type)
                    : undefined;
            }
        }

        states.set(this, { descriptor, registry, present });
        Object.freeze(this);
    }

    /**
     * Plain mapping with the original field names, holding only the
     * fields that were supplied at construction. Nested models are
     * serialized recursively.
     */
    serialize(): Record<string, unknown> {
        const state = stateOf(this);
        const out: Record<string, unknown> = {};
        for (const field of state.descriptor.fields) {
            if (!state.present.has(field.name)) continue;
            out[field.originalName] = dehydrate(this[field.name]);
        }
        return out;
    }

    toJSON(): Record<string, unknown> {
        return this.serialize();
    }

    /** New instance of the same type with `patch` (original names) applied. */
    with(patch: ModelData): DataModel {
        const state = stateOf(this);
        const Model = state.registry.classFor(state.descriptor);
        return new Model({ ...this.serialize(), ...patch });
    }
}

/** Descriptor of a model instance. */
export function descriptorOf(model: DataModel): TypeDescriptor {
    return stateOf(model).descriptor;
}

function stateOf(model: DataModel): ModelState {
    const state = states.get(model);
    if (!state) {
        throw new TypeError('DataModel instance was not constructed through a ModelRegistry class');
    }
    return state;
}

// ── Registry ─────────────────────────────────────────────

/**
 * Descriptor → class factory. One registry serves one built module;
 * classes are created the first time they are needed and reused after.
 */
export class ModelRegistry {
    private readonly classes = new Map<TypeDescriptor, ModelClass>();
    private readonly dates: DateMode;

    constructor(options: ModelRegistryOptions = {}) {
        this.dates = options.dates ?? 'string';
    }

    classFor(descriptor: TypeDescriptor): ModelClass {
        const cached = this.classes.get(descriptor);
        if (cached) return cached;

        const registry = this;
        const Model = class extends DataModel {
            static readonly descriptor = descriptor;

            constructor(data: ModelData = {}) {
                super(descriptor, registry, data);
            }
        };
        Object.defineProperty(Model, 'name', { value: descriptor.name });

        this.classes.set(descriptor, Model);
        return Model;
    }

    /**
     * Turn wire data into model instances where the type says so.
     * Values that do not match the expected structure are returned as-is.
     */
    hydrate(value: unknown, type: FieldType): unknown {
        if (value === null || value === undefined) return value;

        switch (type.kind) {
            case 'type': {
                const Model = this.classFor(type.descriptor);
                if (value instanceof Model) return value;
                if (value instanceof DataModel) return new Model(value.serialize());
                return isRecord(value) ? new Model(value) : value;
            }

            case 'array':
                return Array.isArray(value) ? value.map(item => this.hydrate(item, type.items)) : value;

            case 'map':
                return isRecord(value)
                    ? Object.fromEntries(Object.entries(value).map(([key, item]) => [key, this.hydrate(item, type.values)]))
                    : value;

            case 'primitive':
                return this.dates === 'date' && type.format === 'date-time' ? parseDateTime(value) : value;

            case 'opaque':
                return value;
        }
    }
}

// ── Serialization ────────────────────────────────────────

/**
 * Turn model instances (at any depth) back into plain wire data.
 * `Date`s become ISO 8601 strings in UTC (`…Z`).
 */
export function dehydrate(value: unknown): unknown {
    if (value instanceof DataModel) return value.serialize();
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) return value.map(dehydrate);
    if (isRecord(value) && isPlainObject(value)) {
        return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, dehydrate(item)]));
    }
    return value;
}

/** A `Date` for a parseable string, anything else unchanged. */
function parseDateTime(value: unknown): unknown {
    if (typeof value !== 'string') return value;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? value : date;
}

function isPlainObject(value: object): boolean {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
