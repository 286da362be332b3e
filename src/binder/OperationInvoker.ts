/**
 * OperationInvoker — Descriptor + Arguments → Transport Request → Result
 *
 * Generic invoker shared by every bound method. One call:
 *
 * 1. Partitions arguments by parameter location
 * 2. Substitutes `{name}` placeholders in the path template
 * 3. Builds query pairs, headers and the `Cookie` header
 * 4. Serializes the body (model instances → wire mappings)
 * 5. Hands the request to the transport
 * 6. Marshals a 2xx reply into model instances when the response is typed
 *
 * With a tracer in the context the whole call runs inside one span.
 *
 * Required-argument checks happen here, before the transport is
 * touched. Transport errors propagate unchanged; no retries.
 *
 * @module
 */
import { MissingParameterError } from '../errors.js';
import { isRecord } from '../parser/types.js';
import { dehydrate, type DataModel, type ModelRegistry } from '../schema/DataModel.js';
import type { FieldType, TypeDescriptor } from '../schema/types.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { recordError, recordStatus, type ClientTracer } from '../observability/Tracing.js';
import type { Transport, TransportOptions, TransportRequest, TransportResponse } from '../transport/Transport.js';
import type { OperationDescriptor, ParamDescriptor } from './types.js';

// ── Types ────────────────────────────────────────────────

/** Per-client state an invocation runs against. */
export interface InvocationContext {
    /** Base URL without a trailing slash */
    readonly baseUrl: string;
    /** Default headers of the client instance */
    readonly headers: Readonly<Record<string, string>>;
    readonly transport: Transport;
    readonly transportOptions: TransportOptions;
    readonly registry: ModelRegistry;
    readonly observer?: DebugObserverFn;
    /** Opens one span per call when present */
    readonly tracer?: ClientTracer;
}

/** Call arguments, keyed by translated argument name (wire name accepted too). */
export type CallArgs = Readonly<Record<string, unknown>>;

/**
 * Per-call options. `headers` override every other header source; every
 * other key is merged over the client's transport options.
 */
export interface CallOptions {
    readonly headers?: Readonly<Record<string, string>>;
    readonly [option: string]: unknown;
}

/** What a call resolves to: model instance(s) when typed, else the raw response. */
export type InvocationResult = DataModel | DataModel[] | TransportResponse;

// ── Invoker ──────────────────────────────────────────────

/**
 * Invoke one operation.
 *
 * @throws MissingParameterError when a required argument is absent
 */
export async function invokeOperation(
    descriptor: OperationDescriptor,
    context: InvocationContext,
    args: CallArgs = {},
    options: CallOptions = {},
): Promise<InvocationResult> {
    const label = operationLabel(descriptor);
    const { observer } = context;
    const span = context.tracer?.startSpan(`${descriptor.method} ${label}`, {
        attributes: {
            'openapi.operation': label,
            'http.request.method': descriptor.method,
            'url.template': descriptor.path,
        },
    });

    try {
        let request: TransportRequest;
        try {
            request = buildRequest(descriptor, context, args, options);
        } catch (err) {
            observer?.({ type: 'error', operation: label, error: errorMessage(err), step: 'prepare', timestamp: Date.now() });
            throw err;
        }

        const transportOptions: Record<string, unknown> = { ...context.transportOptions };
        for (const [key, value] of Object.entries(options)) {
            if (key !== 'headers') transportOptions[key] = value;
        }

        observer?.({ type: 'request', operation: label, method: request.method, url: request.url, timestamp: Date.now() });
        span?.setAttribute('url.full', request.url);
        const startTime = performance.now();

        let response: TransportResponse;
        try {
            response = await context.transport.execute(request, transportOptions);
        } catch (err) {
            observer?.({ type: 'error', operation: label, error: errorMessage(err), step: 'transport', timestamp: Date.now() });
            throw err;
        }

        const typed = marshalResponse(descriptor, response, context.registry);
        if (span) recordStatus(span, response.status);

        observer?.({
            type: 'response',
            operation: label,
            status: response.status,
            typed: typed !== undefined,
            durationMs: performance.now() - startTime,
            timestamp: Date.now(),
        });

        return typed ?? response;
    } catch (err) {
        if (span) recordError(span, err);
        throw err;
    } finally {
        span?.end();
    }
}

/**
 * Build the transport request for a call without sending it.
 *
 * @throws MissingParameterError when a required argument is absent
 */
export function buildRequest(
    descriptor: OperationDescriptor,
    context: Pick<InvocationContext, 'baseUrl' | 'headers'>,
    args: CallArgs = {},
    options: CallOptions = {},
): TransportRequest {
    const label = operationLabel(descriptor);

    // 1. Partition arguments
    const values = new Map<ParamDescriptor, unknown>();
    for (const param of descriptor.params) {
        const value = argumentValue(args, param, descriptor);
        if (isAbsent(value)) {
            if (param.required) {
                throw new MissingParameterError(label, param.name, param.location);
            }
            continue;
        }
        values.set(param, value);
    }

    // 2. Path
    const pathParams = new Map<string, unknown>();
    for (const [param, value] of values) {
        if (param.location === 'path') pathParams.set(param.name, value);
    }
    const path = descriptor.path.replace(/\{([^}]+)\}/g, (_match, name: string) => {
        const value = pathParams.get(name) ?? ownValue(args, name);
        if (isAbsent(value)) {
            throw new MissingParameterError(label, name, 'path');
        }
        return encodeURIComponent(formatValue(value));
    });

    // 3. Query, headers, cookies
    const query: Array<[string, string]> = [];
    const paramHeaders: Record<string, string> = {};
    const cookies: string[] = [];

    for (const [param, value] of values) {
        switch (param.location) {
            case 'query':
                if (Array.isArray(value)) {
                    if (param.explode) {
                        for (const item of value) query.push([param.name, formatValue(item)]);
                    } else {
                        query.push([param.name, value.map(formatValue).join(',')]);
                    }
                } else {
                    query.push([param.name, formatValue(value)]);
                }
                break;

            case 'header':
                paramHeaders[param.name] = Array.isArray(value) ? value.map(formatValue).join(',') : formatValue(value);
                break;

            case 'cookie':
                cookies.push(`${param.name}=${encodeURIComponent(formatValue(value))}`);
                break;

            case 'path':
                break;
        }
    }
    if (cookies.length > 0) {
        paramHeaders['Cookie'] = cookies.join('; ');
    }

    // 4. Body
    let body: unknown;
    const bodyDescriptor = descriptor.body;
    if (bodyDescriptor) {
        const value = ownValue(args, bodyDescriptor.argName);
        if (isAbsent(value)) {
            if (bodyDescriptor.required) {
                throw new MissingParameterError(label, bodyDescriptor.argName, 'body');
            }
        } else {
            body = dehydrate(value);
        }
    }

    const headers: Record<string, string> = {
        ...context.headers,
        ...(descriptor.response ? { Accept: descriptor.response.mediaType } : {}),
        ...(bodyDescriptor && body !== undefined ? { 'Content-Type': bodyDescriptor.mediaType } : {}),
        ...paramHeaders,
        ...(options.headers ?? {}),
    };

    return {
        method: descriptor.method,
        url: `${context.baseUrl}${path}`,
        query,
        headers,
        ...(bodyDescriptor && body !== undefined ? { body, mediaType: bodyDescriptor.mediaType } : {}),
    };
}

// ── Response Marshalling ─────────────────────────────────

/**
 * Model instance(s) for a 2xx reply whose payload matches the declared
 * response type, otherwise `undefined`.
 */
export function marshalResponse(
    descriptor: OperationDescriptor,
    response: TransportResponse,
    registry: ModelRegistry,
): DataModel | DataModel[] | undefined {
    if (response.status < 200 || response.status >= 300) return undefined;
    const type = descriptor.response?.type;
    if (!type) return undefined;

    const payload = response.body;
    const model = modelType(type);
    if (model && isRecord(payload)) {
        const Model = registry.classFor(model);
        return new Model(payload);
    }

    if (type.kind === 'array' && Array.isArray(payload)) {
        const item = modelType(type.items);
        if (item && payload.every(isRecord)) {
            const Model = registry.classFor(item);
            return payload.map(entry => new Model(entry));
        }
    }

    return undefined;
}

function modelType(type: FieldType): TypeDescriptor | undefined {
    return type.kind === 'type' ? type.descriptor : undefined;
}

// ── Helpers ──────────────────────────────────────────────

/** Name used in errors and debug events: operationId, else `METHOD /path`. */
export function operationLabel(descriptor: OperationDescriptor): string {
    return descriptor.operationId ?? `${descriptor.method} ${descriptor.path}`;
}

/**
 * Value of one parameter: looked up by argument name, then by wire name
 * when that name belongs to no other argument or parameter.
 */
function argumentValue(args: CallArgs, param: ParamDescriptor, descriptor: OperationDescriptor): unknown {
    const value = ownValue(args, param.argName);
    if (value !== undefined || param.name === param.argName) return value;

    const shared = descriptor.body?.argName === param.name || descriptor.params.some(other =>
        other !== param && (other.argName === param.name || other.name === param.name),
    );
    return shared ? undefined : ownValue(args, param.name);
}

/** `args[key]`, ignoring anything inherited from the prototype chain. */
function ownValue(args: CallArgs, key: string): unknown {
    return Object.prototype.hasOwnProperty.call(args, key) ? args[key] : undefined;
}

function isAbsent(value: unknown): value is null | undefined {
    return value === undefined || value === null;
}

/** Render one parameter value as a string; structured values are JSON-encoded. */
function formatValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'object' && value !== null) return JSON.stringify(dehydrate(value));
    return String(value);
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
