/**
 * NamingTranslator — Schema Identifiers → TypeScript Identifiers
 *
 * Pure, deterministic renaming shared by the type synthesizer, the
 * operation binder and the client assembler:
 *
 *   translate('pet-store', 'type')      → 'PetStore'
 *   translate('get_pet_by_id', 'method') → 'getPetById'
 *   translate('PET_ID', 'field')        → 'petId'
 *   translate('delete', 'method')       → 'delete_'
 *
 * The transform is idempotent: translating its own output yields the
 * same output. The original names are never recomputed from the
 * translated ones; {@link NameMap} stores both sides explicitly.
 *
 * @module
 */
import { NamingCollisionError } from '../errors.js';

// ── Kinds & Styles ───────────────────────────────────────

/** What an identifier names; types use PascalCase, everything else the member style. */
export type IdentifierKind = 'type' | 'method' | 'field' | 'parameter' | 'group';

/** Casing used for members (methods, fields, parameters, groups). */
export type MemberStyle = 'camelCase' | 'snake_case';

/**
 * JavaScript reserved words plus the member names the runtime classes
 * own themselves. A translated member equal to one of these gets a `_`
 * suffix.
 */
const RESERVED = new Set([
    'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default',
    'delete', 'do', 'else', 'enum', 'export', 'extends', 'false', 'finally', 'for',
    'function', 'if', 'import', 'in', 'instanceof', 'new', 'null', 'return', 'super',
    'switch', 'this', 'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with',
    'implements', 'interface', 'let', 'package', 'private', 'protected', 'public',
    'static', 'yield', 'await', 'arguments', 'eval', 'undefined', 'NaN', 'Infinity',
    'constructor', 'prototype', '__proto__', 'toJSON', 'toString', 'valueOf',
    'hasOwnProperty', 'serialize',
]);

/** Type names that would shadow globals the generated classes rely on. */
const RESERVED_TYPES = new Set(['Object', 'Array', 'Function', 'Promise', 'Error', 'Map', 'Set', 'Date']);

// ── Translator ───────────────────────────────────────────

/**
 * Translate a schema identifier into an idiomatic identifier of `kind`.
 *
 * @param identifier - Raw name from the document (any casing, any characters)
 * @param kind - What the name will be used for
 * @param style - Member casing (ignored for types)
 */
export function translate(identifier: string, kind: IdentifierKind, style: MemberStyle = 'camelCase'): string {
    const words = splitWords(identifier);

    let name: string;
    if (kind === 'type') {
        name = words.length > 0 ? toPascalCase(words.join('_')) : 'Unnamed';
    } else if (words.length === 0) {
        name = 'unnamed';
    } else {
        name = style === 'snake_case' ? toSnakeCase(words.join('_')) : toCamelCase(words.join('_'));
    }

    if (/^\d/.test(name)) {
        name = `_${name}`;
    }

    const reserved = kind === 'type' ? RESERVED_TYPES : RESERVED;
    return reserved.has(name) ? `${name}_` : name;
}

/**
 * Split an identifier into words at non-alphanumeric runs, camelCase
 * boundaries and acronym boundaries (`HTTPServer` → `HTTP`, `Server`).
 */
export function splitWords(identifier: string): string[] {
    return identifier
        .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
        .split(/[^A-Za-z0-9]+/)
        .filter(word => word.length > 0);
}

// ── Case Converters ──────────────────────────────────────

/**
 * Convert a camelCase or PascalCase string to snake_case.
 *
 * @example
 * toSnakeCase('getPetById')   → 'get_pet_by_id'
 * toSnakeCase('findPetsByTags') → 'find_pets_by_tags'
 */
export function toSnakeCase(str: string): string {
    return str
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '_')
        .replace(/^_|_$/g, '');
}

/**
 * Convert a string to PascalCase.
 *
 * @example
 * toPascalCase('pet')          → 'Pet'
 * toPascalCase('user-account') → 'UserAccount'
 * toPascalCase('find_pets')    → 'FindPets'
 */
export function toPascalCase(str: string): string {
    return str
        .split(/[-_\s.]+/)
        .filter(Boolean)
        .map(segment => segment.charAt(0).toUpperCase() + segment.slice(1).toLowerCase())
        .join('');
}

/**
 * Convert a string to camelCase.
 *
 * @example
 * toCamelCase('pet_store')  → 'petStore'
 * toCamelCase('user-name')  → 'userName'
 */
export function toCamelCase(str: string): string {
    const pascal = toPascalCase(str);
    return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

// ── Deduplication ────────────────────────────────────────

/** Deduplicate by appending `_2`, `_3`, … */
export function deduplicate(name: string, used: ReadonlySet<string>): string {
    if (!used.has(name)) return name;
    let i = 2;
    while (used.has(`${name}_${i}`)) i++;
    return `${name}_${i}`;
}

// ── Name Map ─────────────────────────────────────────────

/** Read side of a {@link NameMap}, as carried by finished descriptors. */
export interface ReadonlyNameMap {
    original(translated: string): string | undefined;
    translated(original: string): string | undefined;
    names(): string[];
    entries(): Array<[string, string]>;
    readonly size: number;
    /** Whether registrations are closed */
    readonly isFrozen: boolean;
}

/**
 * Bidirectional mapping between translated and original names within
 * one scope (a type's fields, an operation's arguments).
 */
export class NameMap implements ReadonlyNameMap {
    private readonly toOriginalMap = new Map<string, string>();
    private readonly toTranslatedMap = new Map<string, string>();
    private frozen = false;

    /**
     * Translate `original` and register the pair, deduplicating the
     * translated side against names already in this map.
     */
    register(original: string, kind: IdentifierKind, style?: MemberStyle): string {
        const existing = this.toTranslatedMap.get(original);
        if (existing !== undefined) return existing;

        const translated = deduplicate(translate(original, kind, style), new Set(this.toOriginalMap.keys()));
        this.add(translated, original);
        return translated;
    }

    /**
     * Register an explicit pair. When one original name is added under
     * several translated names, `translated(original)` keeps the first.
     *
     * @throws NamingCollisionError if `translated` already maps to another name
     */
    add(translated: string, original: string): void {
        if (this.frozen) {
            throw new TypeError(`Cannot add "${translated}": name map is frozen`);
        }
        const existing = this.toOriginalMap.get(translated);
        if (existing !== undefined && existing !== original) {
            throw new NamingCollisionError(translated, existing, original);
        }
        this.toOriginalMap.set(translated, original);
        if (!this.toTranslatedMap.has(original)) {
            this.toTranslatedMap.set(original, translated);
        }
    }

    /** Original schema name for a translated name. */
    original(translated: string): string | undefined {
        return this.toOriginalMap.get(translated);
    }

    /** Translated name for an original schema name. */
    translated(original: string): string | undefined {
        return this.toTranslatedMap.get(original);
    }

    /** Translated names in registration order. */
    names(): string[] {
        return [...this.toOriginalMap.keys()];
    }

    /** `[translated, original]` pairs in registration order. */
    entries(): Array<[string, string]> {
        return [...this.toOriginalMap.entries()];
    }

    get size(): number {
        return this.toOriginalMap.size;
    }

    /** Reject further registrations; lookups keep working. */
    freeze(): void {
        if (this.frozen) return;
        this.frozen = true;
        Object.freeze(this);
    }

    get isFrozen(): boolean {
        return this.frozen;
    }
}
