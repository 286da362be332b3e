import { describe, it, expect } from 'vitest';
import { RefResolver, lookupPointer } from '../../src/parser/RefResolver.js';
import { UnresolvedReferenceError } from '../../src/errors.js';

// ============================================================================
// RefResolver Tests
// ============================================================================

const DOCUMENT = {
    openapi: '3.0.3',
    info: { title: 'Refs', version: '1' },
    servers: [{ url: 'https://api.example.test' }],
    paths: {
        '/pets/{id}': { get: { operationId: 'getPet' } },
    },
    components: {
        schemas: {
            Pet: {
                type: 'object',
                properties: {
                    id: { type: 'integer' },
                    owner: { $ref: '#/components/schemas/Owner' },
                },
            },
            Owner: { type: 'object', properties: { name: { type: 'string' } } },
            PetAlias: { $ref: '#/components/schemas/Pet' },
            AliasOfAlias: { $ref: '#/components/schemas/PetAlias' },
            LoopA: { $ref: '#/components/schemas/LoopB' },
            LoopB: { $ref: '#/components/schemas/LoopA' },
            'a/b': { type: 'string' },
        },
        parameters: {
            Limit: { name: 'limit', in: 'query', schema: { type: 'integer' } },
            LimitAlias: { $ref: '#/components/parameters/Limit' },
        },
    },
};

describe('RefResolver', () => {
    describe('resolve', () => {
        it('should return the same node for the same pointer', () => {
            const resolver = new RefResolver(DOCUMENT);
            const first = resolver.resolve('#/components/schemas/Pet');
            const second = resolver.resolve('#/components/schemas/Pet');
            expect(first).toBe(second);
            expect(first.kind).toBe('object');
            expect(first.location).toBe('#/components/schemas/Pet');
        });

        it('should dereference reference nodes', () => {
            const resolver = new RefResolver(DOCUMENT);
            const pet = resolver.resolve('#/components/schemas/Pet');
            if (pet.kind !== 'object') throw new Error('expected object');

            const ownerRef = pet.properties[1]?.schema;
            if (!ownerRef) throw new Error('missing owner');
            expect(ownerRef.kind).toBe('reference');

            const owner = resolver.resolve(ownerRef);
            expect(owner).toBe(resolver.resolve('#/components/schemas/Owner'));
        });

        it('should not resolve nested references eagerly', () => {
            const resolver = new RefResolver(DOCUMENT);
            resolver.resolve('#/components/schemas/Pet');
            expect(resolver.size).toBe(1);
        });

        it('should return non-reference nodes unchanged', () => {
            const resolver = new RefResolver(DOCUMENT);
            const node = resolver.normalize({ type: 'string' }, '#/inline');
            expect(resolver.resolve(node)).toBe(node);
        });

        it('should follow alias chains to the concrete node', () => {
            const resolver = new RefResolver(DOCUMENT);
            const node = resolver.resolve('#/components/schemas/AliasOfAlias');
            expect(node).toBe(resolver.resolve('#/components/schemas/Pet'));
        });

        it('should reject alias cycles', () => {
            const resolver = new RefResolver(DOCUMENT);
            expect(() => resolver.resolve('#/components/schemas/LoopA')).toThrow(UnresolvedReferenceError);
            expect(() => resolver.resolve('#/components/schemas/LoopA')).toThrow(/circular alias chain/);
        });

        it('should reject missing pointers', () => {
            const resolver = new RefResolver(DOCUMENT);
            try {
                resolver.resolve('#/components/schemas/DoesNotExist');
                expect.unreachable();
            } catch (err) {
                expect(err).toBeInstanceOf(UnresolvedReferenceError);
                expect(err).toMatchObject({ pointer: '#/components/schemas/DoesNotExist' });
            }
        });

        it('should reject non-local pointers', () => {
            const resolver = new RefResolver(DOCUMENT);
            expect(() => resolver.resolve('other.yaml#/components/schemas/Pet')).toThrow(UnresolvedReferenceError);
        });

        it('should decode escaped pointer segments', () => {
            const resolver = new RefResolver(DOCUMENT);
            expect(resolver.resolve('#/components/schemas/a~1b')).toMatchObject({ kind: 'primitive', primitive: 'string' });
        });
    });

    describe('resolveRaw', () => {
        it('should follow $ref on non-schema objects', () => {
            const resolver = new RefResolver(DOCUMENT);
            expect(resolver.resolveRaw({ $ref: '#/components/parameters/LimitAlias' })).toEqual({
                name: 'limit', in: 'query', schema: { type: 'integer' },
            });
        });

        it('should pass other values through', () => {
            const resolver = new RefResolver(DOCUMENT);
            const value = { name: 'x', in: 'query' };
            expect(resolver.resolveRaw(value)).toBe(value);
            expect(resolver.resolveRaw(undefined)).toBeUndefined();
        });

        it('should reject missing pointers', () => {
            const resolver = new RefResolver(DOCUMENT);
            expect(() => resolver.resolveRaw({ $ref: '#/components/parameters/Nope' })).toThrow(UnresolvedReferenceError);
        });
    });

    describe('assertResolvable', () => {
        it('should accept existing pointers', () => {
            expect(() => new RefResolver(DOCUMENT).assertResolvable('#/components/schemas/Owner')).not.toThrow();
        });

        it('should reject missing and non-local pointers', () => {
            const resolver = new RefResolver(DOCUMENT);
            expect(() => resolver.assertResolvable('#/components/schemas/Nope')).toThrow(UnresolvedReferenceError);
            expect(() => resolver.assertResolvable('other.yaml#/Pet')).toThrow(UnresolvedReferenceError);
        });
    });

    describe('lookupPointer', () => {
        it('should return the root for #', () => {
            expect(lookupPointer(DOCUMENT, '#')).toBe(DOCUMENT);
        });

        it('should index into arrays', () => {
            expect(lookupPointer(DOCUMENT, '#/servers/0/url')).toBe('https://api.example.test');
            expect(lookupPointer(DOCUMENT, '#/servers/01/url')).toBeUndefined();
        });

        it('should percent-decode and unescape segments', () => {
            expect(lookupPointer(DOCUMENT, '#/paths/~1pets~1%7Bid%7D/get/operationId')).toBe('getPet');
        });

        it('should return undefined for missing paths', () => {
            expect(lookupPointer(DOCUMENT, '#/components/schemas/Pet/nothing')).toBeUndefined();
        });
    });
});
