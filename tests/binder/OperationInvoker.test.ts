import { describe, it, expect, vi } from 'vitest';
import { buildClientModule, type ClientModule } from '../../src/runtime/ModuleBuilder.js';
import { buildRequest, invokeOperation, type InvocationContext } from '../../src/binder/OperationInvoker.js';
import type { OperationDescriptor } from '../../src/binder/types.js';
import { DataModel, ModelRegistry } from '../../src/schema/DataModel.js';
import type { DebugObserverFn } from '../../src/observability/DebugObserver.js';
import { SpanStatusCode, type ClientSpan, type ClientTracer, type SpanAttributeValue } from '../../src/observability/Tracing.js';
import type { TransportResponse } from '../../src/transport/Transport.js';
import { MissingParameterError } from '../../src/errors.js';
import { FakeTransport, loadPetstore, makeDocument } from '../fixtures/index.js';

// ============================================================================
// OperationInvoker Tests
// ============================================================================

const BASE_URL = 'https://api.example.test/v1';

function petstore(): { module: ClientModule; operation: (id: string) => OperationDescriptor } {
    const module = buildClientModule(loadPetstore());
    return {
        module,
        operation: (id: string) => {
            const found = module.descriptors.operations.find(op => op.operationId === id);
            if (!found) throw new Error(`operation ${id} not bound`);
            return found;
        },
    };
}

function context(transport: FakeTransport, extra: Partial<InvocationContext> = {}): InvocationContext {
    return {
        baseUrl: BASE_URL,
        headers: {},
        transport,
        transportOptions: {},
        registry: new ModelRegistry(),
        ...extra,
    };
}

describe('OperationInvoker', () => {
    describe('path parameters', () => {
        it('should substitute path placeholders', () => {
            const { operation } = petstore();
            const request = buildRequest(operation('getPet'), { baseUrl: BASE_URL, headers: {} }, { petId: 42 });

            expect(request.method).toBe('GET');
            expect(request.url).toBe('https://api.example.test/v1/pets/42');
        });

        it('should percent-encode path values', () => {
            const { operation } = petstore();
            const request = buildRequest(operation('deletePet'), { baseUrl: BASE_URL, headers: {} }, { petId: 'a/b c' });
            expect(request.url).toBe('https://api.example.test/v1/pets/a%2Fb%20c');
        });

        it('should fail before the transport when a path parameter is missing', async () => {
            const { operation } = petstore();
            const transport = new FakeTransport();

            await expect(invokeOperation(operation('getPet'), context(transport), {}))
                .rejects.toBeInstanceOf(MissingParameterError);
            expect(transport.calls).toHaveLength(0);
        });

        it('should name the missing parameter', () => {
            const { operation } = petstore();
            try {
                buildRequest(operation('getPet'), { baseUrl: BASE_URL, headers: {} }, {});
                expect.unreachable();
            } catch (err) {
                expect(err).toBeInstanceOf(MissingParameterError);
                expect(err).toMatchObject({ operation: 'getPet', parameter: 'petId', location: 'path' });
                expect(err).toHaveProperty('message', 'getPet: missing required path parameter "petId"');
            }
        });

        it('should treat null as missing', () => {
            const { operation } = petstore();
            expect(() => buildRequest(operation('getPet'), { baseUrl: BASE_URL, headers: {} }, { petId: null }))
                .toThrow(MissingParameterError);
        });
    });

    describe('query parameters', () => {
        it('should repeat exploded arrays and join the others', () => {
            const { operation } = petstore();
            const request = buildRequest(operation('listPets'), { baseUrl: BASE_URL, headers: {} }, {
                limit: 10,
                tags: ['calm', 'small'],
                ids: [1, 2],
            });

            expect(request.url).toBe('https://api.example.test/v1/pets');
            expect(request.query).toEqual([
                ['limit', '10'],
                ['tags', 'calm'],
                ['tags', 'small'],
                ['ids', '1,2'],
            ]);
        });

        it('should omit absent optional parameters', () => {
            const { operation } = petstore();
            const request = buildRequest(operation('listPets'), { baseUrl: BASE_URL, headers: {} }, { limit: 5 });
            expect(request.query).toEqual([['limit', '5']]);
        });

        it('should reject a missing required query parameter', () => {
            const { operation } = petstore();
            expect(() => buildRequest(operation('listPets'), { baseUrl: BASE_URL, headers: {} }, {}))
                .toThrow('listPets: missing required query parameter "limit"');
        });
    });

    describe('argument lookup', () => {
        function single(paths: Record<string, unknown>): OperationDescriptor {
            const [found] = buildClientModule(makeDocument(paths)).descriptors.operations;
            if (!found) throw new Error('no operation bound');
            return found;
        }

        const itemWithQueryId = {
            '/items/{id}': {
                get: {
                    operationId: 'getItem',
                    parameters: [
                        { name: 'id', in: 'path', required: true, schema: { type: 'string' } },
                        { name: 'id', in: 'query', schema: { type: 'string' } },
                    ],
                    responses: { '200': { description: 'OK' } },
                },
            },
        };

        it('should not send one argument to two parameters sharing a wire name', () => {
            const operation = single(itemWithQueryId);
            const request = buildRequest(operation, { baseUrl: BASE_URL, headers: {} }, { id: 'abc' });

            expect(operation.params.map(p => p.argName)).toEqual(['id', 'id_2']);
            expect(request.url).toBe('https://api.example.test/v1/items/abc');
            expect(request.query).toEqual([]);
        });

        it('should reach the second parameter through its deduplicated name', () => {
            const operation = single(itemWithQueryId);
            const request = buildRequest(operation, { baseUrl: BASE_URL, headers: {} }, { id: 'abc', id_2: 'q' });

            expect(request.query).toEqual([['id', 'q']]);
            expect(operation.names.translated('id')).toBe('id');
            expect(operation.names.original('id_2')).toBe('id');
        });

        it('should ignore inherited object members', () => {
            const operation = single({
                '/search': {
                    get: {
                        operationId: 'search',
                        parameters: [
                            { name: 'toString', in: 'query', required: true, schema: { type: 'string' } },
                            { name: 'constructor', in: 'query', schema: { type: 'string' } },
                        ],
                        responses: { '200': { description: 'OK' } },
                    },
                },
            });

            expect(() => buildRequest(operation, { baseUrl: BASE_URL, headers: {} }, {}))
                .toThrow(MissingParameterError);
            const request = buildRequest(operation, { baseUrl: BASE_URL, headers: {} }, { toString: 'x' });
            expect(request.query).toEqual([['toString', 'x']]);
        });
    });

    describe('headers and cookies', () => {
        it('should accept translated and wire argument names', () => {
            const { operation } = petstore();
            const byArgName = buildRequest(operation('getPet'), { baseUrl: BASE_URL, headers: {} }, { petId: 1, xTraceId: 'trace-1' });
            const byWireName = buildRequest(operation('getPet'), { baseUrl: BASE_URL, headers: {} }, { petId: 1, 'X-Trace-Id': 'trace-2' });

            expect(byArgName.headers['X-Trace-Id']).toBe('trace-1');
            expect(byWireName.headers['X-Trace-Id']).toBe('trace-2');
        });

        it('should fold cookies into one Cookie header', () => {
            const { operation } = petstore();
            const request = buildRequest(operation('getPet'), { baseUrl: BASE_URL, headers: {} }, { petId: 1, session: 'a b' });
            expect(request.headers['Cookie']).toBe('session=a%20b');
        });

        it('should layer config < parameter < per-call headers', () => {
            const { operation } = petstore();
            const ctx = { baseUrl: BASE_URL, headers: { 'X-Trace-Id': 'from-config', 'X-Client': 'test' } };

            expect(buildRequest(operation('getPet'), ctx, { petId: 1 }).headers['X-Trace-Id']).toBe('from-config');
            expect(buildRequest(operation('getPet'), ctx, { petId: 1, xTraceId: 'from-param' }).headers['X-Trace-Id']).toBe('from-param');

            const request = buildRequest(operation('getPet'), ctx, { petId: 1, xTraceId: 'from-param' }, {
                headers: { 'X-Trace-Id': 'from-call' },
            });
            expect(request.headers).toEqual({
                'X-Trace-Id': 'from-call',
                'X-Client': 'test',
                Accept: 'application/json',
            });
        });
    });

    describe('body', () => {
        it('should serialize model instances', () => {
            const { module, operation } = petstore();
            const Pet = module.types.get('Pet');
            if (!Pet) throw new Error('Pet missing');

            const request = buildRequest(operation('createPet'), { baseUrl: BASE_URL, headers: {} }, {
                body: new Pet({ pet_id: 1, name: 'Rex' }),
            });

            expect(request.body).toEqual({ pet_id: 1, name: 'Rex' });
            expect(request.mediaType).toBe('application/json');
            expect(request.headers['Content-Type']).toBe('application/json');
        });

        it('should pass raw mappings through', () => {
            const { operation } = petstore();
            const request = buildRequest(operation('createPet'), { baseUrl: BASE_URL, headers: {} }, {
                body: { pet_id: 2, name: 'Max' },
            });
            expect(request.body).toEqual({ pet_id: 2, name: 'Max' });
        });

        it('should reject a missing required body', () => {
            const { operation } = petstore();
            expect(() => buildRequest(operation('createPet'), { baseUrl: BASE_URL, headers: {} }, {}))
                .toThrow('createPet: missing required body parameter "body"');
        });

        it('should send no body or Content-Type for body-less operations', () => {
            const { operation } = petstore();
            const request = buildRequest(operation('deletePet'), { baseUrl: BASE_URL, headers: {} }, { petId: 1 });
            expect(request.body).toBeUndefined();
            expect(request.headers).toEqual({});
        });
    });

    describe('responses', () => {
        it('should return a model instance for a typed 2xx reply', async () => {
            const { operation } = petstore();
            const transport = new FakeTransport(() => ({ status: 200, headers: {}, body: { pet_id: 5, name: 'Rex' } }));

            const result = await invokeOperation(operation('getPet'), context(transport), { petId: 5 });

            expect(result).toBeInstanceOf(DataModel);
            expect(result instanceof DataModel && result['petId']).toBe(5);
        });

        it('should return model instances for typed arrays', async () => {
            const { operation } = petstore();
            const transport = new FakeTransport(() => ({
                status: 200,
                headers: {},
                body: [{ pet_id: 1 }, { pet_id: 2 }],
            }));

            const result = await invokeOperation(operation('listPets'), context(transport), { limit: 2 });

            expect(Array.isArray(result)).toBe(true);
            expect(Array.isArray(result) && result.map(pet => pet['petId'])).toEqual([1, 2]);
        });

        it('should return the raw response for non-2xx replies', async () => {
            const { operation } = petstore();
            const reply: TransportResponse = { status: 404, headers: {}, body: { code: 404, message: 'no pet' } };
            const transport = new FakeTransport(() => reply);

            await expect(invokeOperation(operation('getPet'), context(transport), { petId: 9 })).resolves.toBe(reply);
        });

        it('should return the raw response when the payload does not match', async () => {
            const { operation } = petstore();
            const reply: TransportResponse = { status: 200, headers: {}, body: 'plain text' };
            const transport = new FakeTransport(() => reply);

            await expect(invokeOperation(operation('getPet'), context(transport), { petId: 9 })).resolves.toBe(reply);
        });

        it('should return the raw response for untyped operations', async () => {
            const { operation } = petstore();
            const reply: TransportResponse = { status: 204, headers: {}, body: undefined };
            const transport = new FakeTransport(() => reply);

            await expect(invokeOperation(operation('deletePet'), context(transport), { petId: 9 })).resolves.toBe(reply);
        });
    });

    describe('transport', () => {
        it('should hand the built request to the transport', async () => {
            const { operation } = petstore();
            const transport = new FakeTransport();

            await invokeOperation(operation('getPet'), context(transport), { petId: 42 });

            expect(transport.lastRequest()).toEqual({
                method: 'GET',
                url: 'https://api.example.test/v1/pets/42',
                query: [],
                headers: { Accept: 'application/json' },
            });
        });

        it('should merge per-call options over the client transport options', async () => {
            const { operation } = petstore();
            const transport = new FakeTransport();

            await invokeOperation(
                operation('getPet'),
                context(transport, { transportOptions: { timeoutMs: 1000, retries: 0 } }),
                { petId: 1 },
                { timeoutMs: 50, headers: { 'X-Extra': '1' } },
            );

            expect(transport.calls[0]?.options).toEqual({ timeoutMs: 50, retries: 0 });
        });

        it('should propagate transport errors unchanged', async () => {
            const { operation } = petstore();
            const failure = new Error('connection reset');
            const transport = new FakeTransport(() => {
                throw failure;
            });

            await expect(invokeOperation(operation('getPet'), context(transport), { petId: 1 })).rejects.toBe(failure);
        });
    });

    describe('debug events', () => {
        it('should emit request and response events', async () => {
            const { operation } = petstore();
            const observer = vi.fn<DebugObserverFn>();
            const transport = new FakeTransport(() => ({ status: 200, headers: {}, body: { pet_id: 1 } }));

            await invokeOperation(operation('getPet'), context(transport, { observer }), { petId: 1 });

            expect(observer.mock.calls.map(([event]) => event.type)).toEqual(['request', 'response']);
            expect(observer.mock.calls[0]?.[0]).toMatchObject({
                type: 'request',
                operation: 'getPet',
                method: 'GET',
                url: 'https://api.example.test/v1/pets/1',
            });
            expect(observer.mock.calls[1]?.[0]).toMatchObject({ type: 'response', status: 200, typed: true });
        });

        it('should emit an error event for preparation failures', async () => {
            const { operation } = petstore();
            const observer = vi.fn<DebugObserverFn>();

            await expect(invokeOperation(operation('getPet'), context(new FakeTransport(), { observer }), {}))
                .rejects.toThrow(MissingParameterError);
            expect(observer).toHaveBeenCalledWith(expect.objectContaining({ type: 'error', step: 'prepare', operation: 'getPet' }));
        });

        it('should emit an error event for transport failures', async () => {
            const { operation } = petstore();
            const observer = vi.fn<DebugObserverFn>();
            const transport = new FakeTransport(() => {
                throw new Error('offline');
            });

            await expect(invokeOperation(operation('getPet'), context(transport, { observer }), { petId: 1 })).rejects.toThrow('offline');
            expect(observer).toHaveBeenLastCalledWith(expect.objectContaining({ type: 'error', step: 'transport', error: 'offline' }));
        });
    });

    describe('tracing', () => {
        interface RecordedSpan {
            name: string;
            attributes: Map<string, SpanAttributeValue>;
            statuses: Array<{ code: number; message?: string }>;
            exceptions: Array<Error | string>;
            ended: number;
        }

        function recordingTracer(): { tracer: ClientTracer; spans: RecordedSpan[] } {
            const spans: RecordedSpan[] = [];
            const tracer: ClientTracer = {
                startSpan(name, options) {
                    const recorded: RecordedSpan = {
                        name,
                        attributes: new Map(Object.entries(options?.attributes ?? {})),
                        statuses: [],
                        exceptions: [],
                        ended: 0,
                    };
                    spans.push(recorded);
                    const span: ClientSpan = {
                        setAttribute(key, value) { recorded.attributes.set(key, value); },
                        setStatus(status) { recorded.statuses.push(status); },
                        recordException(exception) { recorded.exceptions.push(exception); },
                        end() { recorded.ended++; },
                    };
                    return span;
                },
            };
            return { tracer, spans };
        }

        it('should open and end one span per call', async () => {
            const { operation } = petstore();
            const { tracer, spans } = recordingTracer();
            const transport = new FakeTransport(() => ({ status: 200, headers: {}, body: { pet_id: 1 } }));

            await invokeOperation(operation('getPet'), context(transport, { tracer }), { petId: 1 });

            expect(spans).toHaveLength(1);
            expect(spans[0]?.name).toBe('GET getPet');
            expect(Object.fromEntries(spans[0]?.attributes ?? [])).toEqual({
                'openapi.operation': 'getPet',
                'http.request.method': 'GET',
                'url.template': '/pets/{petId}',
                'url.full': 'https://api.example.test/v1/pets/1',
                'http.response.status_code': 200,
            });
            expect(spans[0]?.statuses).toEqual([{ code: SpanStatusCode.OK }]);
            expect(spans[0]?.ended).toBe(1);
        });

        it('should leave client errors unset and mark server errors', async () => {
            const { operation } = petstore();
            const { tracer, spans } = recordingTracer();
            const statuses = [404, 503];
            const transport = new FakeTransport(() => ({ status: statuses.shift() ?? 200, headers: {}, body: undefined }));

            await invokeOperation(operation('deletePet'), context(transport, { tracer }), { petId: 1 });
            await invokeOperation(operation('deletePet'), context(transport, { tracer }), { petId: 1 });

            expect(spans[0]?.statuses).toEqual([]);
            expect(spans[1]?.statuses).toEqual([{ code: SpanStatusCode.ERROR, message: 'HTTP 503' }]);
        });

        it('should record thrown errors and still end the span', async () => {
            const { operation } = petstore();
            const { tracer, spans } = recordingTracer();

            await expect(invokeOperation(operation('getPet'), context(new FakeTransport(), { tracer }), {}))
                .rejects.toThrow(MissingParameterError);

            expect(spans[0]?.exceptions).toHaveLength(1);
            expect(spans[0]?.statuses).toEqual([{ code: SpanStatusCode.ERROR, message: 'getPet: missing required path parameter "petId"' }]);
            expect(spans[0]?.ended).toBe(1);
        });
    });
});
