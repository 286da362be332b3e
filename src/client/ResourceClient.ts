/**
 * ResourceClient / ApiClient — Runtime Client Classes
 *
 * One {@link ResourceClient} subclass per resource group, one own method
 * per operation, all dispatching through the generic invoker:
 *
 * ```typescript
 * const pets = new PetsClient({ baseUrl: 'https://api.example.com' });
 * const pet = await pets.getPet({ petId: 42 });
 * pets.getPet.signature;  // 'getPet({ petId: integer }) → Pet'
 * ```
 *
 * The aggregate {@link ApiClient} exposes one resource client per group
 * under the group's attribute name.
 *
 * @module
 */
import {
    invokeOperation, type CallArgs, type CallOptions,
    type InvocationContext, type InvocationResult,
} from '../binder/OperationInvoker.js';
import type { OperationDescriptor } from '../binder/types.js';
import type { ServerInfo } from '../parser/DocumentLoader.js';
import type { ModelRegistry } from '../schema/DataModel.js';
import { describeFieldType } from '../schema/types.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { resolveClientConfig, type ClientConfig } from './ClientConfig.js';
import type { ClientDescriptor } from './ClientAssembler.js';

// ── Types ────────────────────────────────────────────────

/** A callable operation with its metadata attached. */
export interface BoundMethod {
    (args?: CallArgs, options?: CallOptions): Promise<InvocationResult>;
    readonly descriptor: OperationDescriptor;
    /** One-line call signature, e.g. `getPet({ petId: integer }) → Pet` */
    readonly signature: string;
    /** Signature, summary, description and parameter list */
    help(): string;
}

/** What the generated classes share: the document's servers and models. */
export interface ClientEnvironment {
    readonly servers: readonly ServerInfo[];
    readonly registry: ModelRegistry;
    readonly observer?: DebugObserverFn;
}

export interface ResourceClientClass {
    new (config?: ClientConfig): ResourceClient;
    readonly descriptor: ClientDescriptor;
}

export interface ApiInfo {
    readonly title: string;
    readonly version: string;
}

export interface ApiClientClass {
    new (config?: ClientConfig): ApiClient;
    /** Attribute name → resource client class */
    readonly clients: ReadonlyMap<string, ResourceClientClass>;
    readonly info: ApiInfo;
}

// ── Resource Client ──────────────────────────────────────

export abstract class ResourceClient {
    [method: string]: BoundMethod;

    protected constructor(descriptor: ClientDescriptor, environment: ClientEnvironment, config: ClientConfig) {
        const resolved = resolveClientConfig(config, environment.servers, environment.observer);
        const context: InvocationContext = {
            baseUrl: resolved.baseUrl,
            headers: resolved.headers,
            transport: resolved.transport,
            transportOptions: resolved.transportOptions,
            registry: environment.registry,
            ...(resolved.observer ? { observer: resolved.observer } : {}),
            ...(resolved.tracer ? { tracer: resolved.tracer } : {}),
        };

        for (const [name, operation] of descriptor.methods) {
            this[name] = bindMethod(name, operation, (args, options) => invokeOperation(operation, context, args, options));
        }
        Object.freeze(this);
    }
}

/** Create the class of one resource group. */
export function createResourceClientClass(descriptor: ClientDescriptor, environment: ClientEnvironment): ResourceClientClass {
    const Client = class extends ResourceClient {
        static readonly descriptor = descriptor;

        constructor(config: ClientConfig = {}) {
            super(descriptor, environment, config);
        }
    };
    Object.defineProperty(Client, 'name', { value: descriptor.className });
    return Client;
}

// ── Aggregate Client ─────────────────────────────────────

export abstract class ApiClient {
    [group: string]: ResourceClient;

    protected constructor(clients: ReadonlyMap<string, ResourceClientClass>, config: ClientConfig) {
        for (const [attribute, Client] of clients) {
            this[attribute] = new Client(config);
        }
        Object.freeze(this);
    }
}

/** Create the aggregate class composing every resource client class. */
export function createApiClientClass(
    name: string,
    clients: ReadonlyMap<string, ResourceClientClass>,
    info: ApiInfo,
): ApiClientClass {
    const Aggregate = class extends ApiClient {
        static readonly clients = clients;
        static readonly info = info;

        constructor(config: ClientConfig = {}) {
            super(clients, config);
        }
    };
    Object.defineProperty(Aggregate, 'name', { value: name });
    return Aggregate;
}

// ── Bound Methods ────────────────────────────────────────

function bindMethod(
    name: string,
    operation: OperationDescriptor,
    call: (args?: CallArgs, options?: CallOptions) => Promise<InvocationResult>,
): BoundMethod {
    const signature = signatureOf(name, operation);
    const method = Object.assign(
        (args?: CallArgs, options?: CallOptions) => call(args, options),
        {
            descriptor: operation,
            signature,
            help: () => helpText(signature, operation),
        },
    );
    Object.defineProperty(method, 'name', { value: name });
    return Object.freeze(method);
}

/** `getPet({ petId: integer, verbose?: boolean }) → Pet` */
export function signatureOf(name: string, operation: OperationDescriptor): string {
    const args = operation.params.map(param =>
        `${param.argName}${param.required ? '' : '?'}: ${describeFieldType(param.type)}`,
    );
    if (operation.body) {
        args.push(`${operation.body.argName}${operation.body.required ? '' : '?'}: ${describeFieldType(operation.body.type)}`);
    }

    const result = operation.response ? describeFieldType(operation.response.type) : 'TransportResponse';
    const argList = args.length > 0 ? `{ ${args.join(', ')} }` : '';
    return `${name}(${argList}) → ${result}`;
}

function helpText(signature: string, operation: OperationDescriptor): string {
    const lines = [signature, `${operation.method} ${operation.path}`];
    if (operation.deprecated) lines.push('Deprecated.');
    if (operation.summary) lines.push('', operation.summary);
    if (operation.description) lines.push('', operation.description);

    const entries = operation.params.map(param => {
        const flags = `${param.location}, ${describeFieldType(param.type)}${param.required ? ', required' : ''}`;
        return `  ${param.argName} (${flags})${param.description ? `: ${param.description}` : ''}`;
    });
    if (operation.body) {
        const body = operation.body;
        const flags = `body ${body.mediaType}, ${describeFieldType(body.type)}${body.required ? ', required' : ''}`;
        entries.push(`  ${body.argName} (${flags})${body.description ? `: ${body.description}` : ''}`);
    }
    if (entries.length > 0) {
        lines.push('', 'Parameters:', ...entries);
    }
    return lines.join('\n');
}
