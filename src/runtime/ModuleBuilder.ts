/**
 * ModuleBuilder — Document → Installed Client Module
 *
 * Orchestrates the whole pipeline for one document:
 *
 *   shape check → resolve → synthesize types → bind operations
 *   → assemble groups → create classes → install
 *
 * The build is all-or-nothing: every class is created before anything
 * is written into the target namespace, so a failing build (e.g. an
 * unresolvable `$ref`) leaves the namespace untouched.
 *
 * @example
 * ```typescript
 * import { createClient } from 'openapi-runtime-client';
 *
 * const api = createClient(document, { baseUrl: 'https://api.example.com' });
 * const pet = await api.pets.getPet({ petId: 42 });
 * ```
 *
 * @module
 */
import { assertOpenApiDocument, extractServers, loadDocument, type LoadDocumentOptions, type OpenApiDocument, type ServerInfo } from '../parser/DocumentLoader.js';
import { RefResolver } from '../parser/RefResolver.js';
import { isRecord } from '../parser/types.js';
import type { DegradeHandler } from '../parser/SchemaNormalizer.js';
import { deduplicate, NameMap } from '../naming/NamingTranslator.js';
import { TypeSynthesizer } from '../schema/TypeSynthesizer.js';
import { ModelRegistry, type ModelClass } from '../schema/DataModel.js';
import type { FieldType, TypeDescriptor } from '../schema/types.js';
import { collectOperations } from '../binder/OperationBinder.js';
import type { OperationDescriptor } from '../binder/types.js';
import { assembleClients, type ClientDescriptor } from '../client/ClientAssembler.js';
import type { ClientConfig } from '../client/ClientConfig.js';
import {
    createApiClientClass, createResourceClientClass,
    type ApiClient, type ApiClientClass, type ResourceClientClass,
} from '../client/ResourceClient.js';
import { mergeConfig, type BuilderConfig, type PartialConfig } from '../config/BuilderConfig.js';
import { resolveObserver } from '../observability/DebugObserver.js';

// ── Types ────────────────────────────────────────────────

/** Any object the built classes can be assigned into. */
export type Namespace = Record<string, unknown>;

/** Everything one build produced. */
export interface ClientModule {
    readonly title: string;
    readonly version: string;
    readonly servers: readonly ServerInfo[];
    /** Type name → model class */
    readonly types: ReadonlyMap<string, ModelClass>;
    /** Class name → resource client class */
    readonly clients: ReadonlyMap<string, ResourceClientClass>;
    /** The aggregate client class */
    readonly ApiClient: ApiClientClass;
    readonly descriptors: ModuleDescriptors;
    readonly config: BuilderConfig;
}

export interface ModuleDescriptors {
    readonly types: readonly TypeDescriptor[];
    readonly operations: readonly OperationDescriptor[];
    /** Group key → client descriptor */
    readonly clients: ReadonlyMap<string, ClientDescriptor>;
}

export interface BuildOptions extends PartialConfig {
    /** Install the result here once the build succeeded */
    readonly namespace?: Namespace;
}

// ── Public API ───────────────────────────────────────────

/**
 * Build every type, resource client and the aggregate client of a
 * document.
 *
 * @param source - A parsed document (checked here)
 * @throws InvalidDocumentError when `source` is not an OpenAPI 3.x document
 * @throws UnresolvedReferenceError when a `$ref` does not resolve
 */
export function buildClientModule(source: unknown, options: BuildOptions = {}): ClientModule {
    const startTime = performance.now();
    const document = assertOpenApiDocument(source);
    const config = mergeConfig(options);
    const observer = resolveObserver(config.debug);
    const style = config.naming.style;

    const onDegrade: DegradeHandler | undefined = observer
        ? error => observer({
            type: 'degrade',
            location: error.location,
            construct: error.construct,
            error,
            timestamp: Date.now(),
        })
        : undefined;

    // 1. Types
    const resolver = new RefResolver(document, onDegrade);
    const synthesizer = new TypeSynthesizer(resolver, { style, ...(onDegrade ? { onDegrade } : {}) });
    synthesizer.synthesizeComponents(componentSchemaNames(document));

    // 2. Operations
    const operations = collectOperations(
        document,
        {
            resolver,
            synthesizer,
            style,
            defaultGroup: config.defaultGroup,
            ...(observer ? { observer } : {}),
        },
        {
            includeTags: config.includeTags,
            excludeTags: config.excludeTags,
            deprecated: config.deprecated,
        },
    );

    synthesizer.freeze();
    for (const operation of operations) freezeOperation(operation);

    // 3. Classes
    const registry = new ModelRegistry({ dates: config.dates });
    const types = new Map<string, ModelClass>();
    for (const descriptor of synthesizer.types()) {
        types.set(descriptor.name, registry.classFor(descriptor));
    }

    const clientDescriptors = assembleClients(operations, {
        style,
        descriptions: tagDescriptions(document),
        takenNames: new Set(types.keys()),
    });

    const servers = extractServers(document);
    const environment = { servers, registry, ...(observer ? { observer } : {}) };

    const clients = new Map<string, ResourceClientClass>();
    const byAttribute = new Map<string, ResourceClientClass>();
    for (const descriptor of clientDescriptors.values()) {
        const Client = createResourceClientClass(descriptor, environment);
        clients.set(descriptor.className, Client);
        byAttribute.set(descriptor.attribute, Client);
    }

    const title = document.info.title ?? 'API';
    const version = document.info.version ?? '';
    const aggregateName = deduplicate(config.clientName, new Set([...types.keys(), ...clients.keys()]));
    const Aggregate = createApiClientClass(aggregateName, byAttribute, Object.freeze({ title, version }));

    const module: ClientModule = Object.freeze({
        title,
        version,
        servers,
        types,
        clients,
        ApiClient: Aggregate,
        descriptors: Object.freeze({
            types: Object.freeze(synthesizer.types()),
            operations: Object.freeze(operations),
            clients: clientDescriptors,
        }),
        config,
    });

    observer?.({
        type: 'build',
        title,
        types: types.size,
        operations: operations.length,
        groups: clients.size,
        durationMs: performance.now() - startTime,
        timestamp: Date.now(),
    });

    if (options.namespace) {
        installClientModule(module, options.namespace);
    }
    return module;
}

/**
 * Assign every model class, resource client class and the aggregate
 * class of a built module into `namespace`, under their class names.
 */
export function installClientModule(module: ClientModule, namespace: Namespace): void {
    for (const [name, Model] of module.types) {
        namespace[name] = Model;
    }
    for (const [name, Client] of module.clients) {
        namespace[name] = Client;
    }
    namespace[module.ApiClient.name] = module.ApiClient;
}

/**
 * Load a document from any supported source and build it.
 *
 * @param source - Pre-parsed object, URL, file path or inline YAML/JSON
 */
export async function loadClientModule(
    source: string | object,
    options: BuildOptions = {},
    loadOptions: LoadDocumentOptions = {},
): Promise<ClientModule> {
    const document = await loadDocument(source, loadOptions);
    return buildClientModule(document, options);
}

/** Build a document and instantiate its aggregate client in one step. */
export function createClient(
    document: unknown,
    clientConfig: ClientConfig = {},
    builderConfig: BuildOptions = {},
): ApiClient {
    const { ApiClient: Aggregate } = buildClientModule(document, builderConfig);
    return new Aggregate(clientConfig);
}

// ── Helpers ──────────────────────────────────────────────

function componentSchemaNames(document: OpenApiDocument): string[] {
    const schemas = document.components?.['schemas'];
    return isRecord(schemas) ? Object.keys(schemas) : [];
}

function tagDescriptions(document: OpenApiDocument): Map<string, string> {
    const descriptions = new Map<string, string>();
    for (const tag of document.tags ?? []) {
        if (!isRecord(tag)) continue;
        const name = tag['name'];
        const description = tag['description'];
        if (typeof name === 'string' && typeof description === 'string') {
            descriptions.set(name, description);
        }
    }
    return descriptions;
}

function freezeOperation(operation: OperationDescriptor): void {
    for (const param of operation.params) {
        freezeFieldType(param.type);
        Object.freeze(param);
    }
    Object.freeze(operation.params);
    if (operation.body) {
        freezeFieldType(operation.body.type);
        Object.freeze(operation.body);
    }
    if (operation.response) {
        freezeFieldType(operation.response.type);
        Object.freeze(operation.response);
    }
    if (operation.names instanceof NameMap) operation.names.freeze();
    Object.freeze(operation);
}

/** Freeze an inline field type; named types are frozen by the synthesizer. */
function freezeFieldType(type: FieldType): void {
    if (type.kind === 'array') freezeFieldType(type.items);
    if (type.kind === 'map') freezeFieldType(type.values);
    Object.freeze(type);
}
