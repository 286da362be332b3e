import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
    assertOpenApiDocument, parseDocument, loadDocument,
    fetchDocument, extractServers,
} from '../../src/parser/DocumentLoader.js';
import { InvalidDocumentError } from '../../src/errors.js';
import { PETSTORE_YAML, loadPetstore } from '../fixtures/index.js';

// ============================================================================
// DocumentLoader Tests
// ============================================================================

const MINIMAL_JSON = JSON.stringify({
    openapi: '3.1.0',
    info: { title: 'Minimal', version: '2.0.0' },
    paths: {},
});

describe('DocumentLoader', () => {
    describe('parseDocument', () => {
        it('should parse YAML', () => {
            const doc = parseDocument(PETSTORE_YAML);
            expect(doc.openapi).toBe('3.0.3');
            expect(doc.info.title).toBe('Petstore');
            expect(Object.keys(doc.paths)).toEqual(['/pets', '/pets/{petId}', '/health']);
        });

        it('should parse JSON', () => {
            const doc = parseDocument(MINIMAL_JSON);
            expect(doc.info.title).toBe('Minimal');
            expect(doc.info.version).toBe('2.0.0');
        });

        it('should reject unparsable text', () => {
            expect(() => parseDocument('key: [1, 2')).toThrow(InvalidDocumentError);
            expect(() => parseDocument('key: [1, 2')).toThrow(/^Could not parse document/);
        });
    });

    describe('assertOpenApiDocument', () => {
        it('should reject Swagger 2.0 documents', () => {
            try {
                assertOpenApiDocument({ swagger: '2.0', info: { title: 'Old' }, paths: {} });
                expect.unreachable();
            } catch (err) {
                expect(err).toBeInstanceOf(InvalidDocumentError);
                if (!(err instanceof InvalidDocumentError)) return;
                expect(err.issues.some(issue => issue.startsWith('openapi: '))).toBe(true);
            }
        });

        it('should reject unsupported versions', () => {
            try {
                assertOpenApiDocument({ openapi: '4.0.0', info: {}, paths: {} });
                expect.unreachable();
            } catch (err) {
                if (!(err instanceof InvalidDocumentError)) throw err;
                expect(err.issues).toEqual(['openapi: OpenAPI 3.x required']);
            }
        });

        it('should reject non-objects', () => {
            try {
                assertOpenApiDocument('not a document');
                expect.unreachable();
            } catch (err) {
                if (!(err instanceof InvalidDocumentError)) throw err;
                expect(err.issues[0]).toMatch(/^\(root\): /);
            }
        });

        it('should keep unknown top-level keys', () => {
            const doc = assertOpenApiDocument({ openapi: '3.0.0', info: {}, paths: {}, 'x-vendor': 1 });
            expect(doc['x-vendor']).toBe(1);
        });
    });

    describe('loadDocument', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'openapi-loader-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should accept pre-parsed objects', async () => {
            const doc = await loadDocument(JSON.parse(MINIMAL_JSON));
            expect(doc.info.title).toBe('Minimal');
        });

        it('should read files relative to cwd', async () => {
            writeFileSync(join(dir, 'api.yaml'), PETSTORE_YAML);
            const doc = await loadDocument('api.yaml', { cwd: dir });
            expect(doc.info.title).toBe('Petstore');
        });

        it('should treat other strings as inline text', async () => {
            const doc = await loadDocument(MINIMAL_JSON, { cwd: dir });
            expect(doc.info.title).toBe('Minimal');
        });

        it('should fetch URLs', async () => {
            const fetchFn = vi.fn(async (_input: string | URL | Request) => new Response(MINIMAL_JSON, { status: 200 }));
            const doc = await loadDocument('https://docs.example.test/openapi.json', { fetchFn });
            expect(doc.info.title).toBe('Minimal');
            expect(fetchFn).toHaveBeenCalledWith('https://docs.example.test/openapi.json');
        });
    });

    describe('fetchDocument', () => {
        it('should fail on non-2xx answers', async () => {
            const fetchFn = vi.fn(async (_input: string | URL | Request) => new Response('missing', { status: 404 }));
            await expect(fetchDocument('https://docs.example.test/openapi.json', fetchFn))
                .rejects.toThrow('Could not fetch "https://docs.example.test/openapi.json": HTTP 404');
        });
    });

    describe('extractServers', () => {
        it('should keep variable defaults', () => {
            expect(extractServers(loadPetstore())).toEqual([
                { url: 'https://{region}.petstore.test/v1', variables: { region: 'eu' } },
            ]);
        });

        it('should skip entries without a url', () => {
            const doc = assertOpenApiDocument({
                openapi: '3.0.0', info: {}, paths: {},
                servers: [{ description: 'broken' }, { url: '/relative', description: 'Local' }],
            });
            expect(extractServers(doc)).toEqual([{ url: '/relative', description: 'Local', variables: {} }]);
        });
    });
});
