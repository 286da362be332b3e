/**
 * openapi-runtime-client — Public API
 *
 * Builds typed API clients from an OpenAPI 3.x document at runtime.
 *
 * @module
 */

// ── Module Builder ───────────────────────────────────────
export {
    buildClientModule, installClientModule, loadClientModule, createClient,
} from './runtime/ModuleBuilder.js';
export type { ClientModule, ModuleDescriptors, BuildOptions, Namespace } from './runtime/ModuleBuilder.js';

// ── Document Loading ─────────────────────────────────────
export {
    assertOpenApiDocument, parseDocument, readDocumentFile,
    fetchDocument, loadDocument, extractServers,
} from './parser/DocumentLoader.js';
export type { OpenApiDocument, ServerInfo, LoadDocumentOptions } from './parser/DocumentLoader.js';

// ── Resolution & Synthesis ───────────────────────────────
export { RefResolver, lookupPointer } from './parser/RefResolver.js';
export { normalizeSchema } from './parser/SchemaNormalizer.js';
export type { DegradeHandler } from './parser/SchemaNormalizer.js';
export type { SchemaNode, PrimitiveKind } from './parser/types.js';
export { TypeSynthesizer } from './schema/TypeSynthesizer.js';
export type { SynthesizerOptions } from './schema/TypeSynthesizer.js';
export { DataModel, ModelRegistry, descriptorOf, dehydrate } from './schema/DataModel.js';
export type { ModelClass, ModelData, DateMode, ModelRegistryOptions } from './schema/DataModel.js';
export { describeFieldType } from './schema/types.js';
export type { FieldType, FieldDescriptor, TypeDescriptor } from './schema/types.js';

// ── Naming ───────────────────────────────────────────────
export {
    translate, splitWords, deduplicate, NameMap,
    toSnakeCase, toPascalCase, toCamelCase,
} from './naming/NamingTranslator.js';
export type { IdentifierKind, MemberStyle, ReadonlyNameMap } from './naming/NamingTranslator.js';

// ── Operations ───────────────────────────────────────────
export { collectOperations, bindOperation, inferFromMethodAndPath } from './binder/OperationBinder.js';
export type { BinderContext, OperationFilter } from './binder/OperationBinder.js';
export { invokeOperation, buildRequest, marshalResponse, operationLabel } from './binder/OperationInvoker.js';
export type { InvocationContext, CallArgs, CallOptions, InvocationResult } from './binder/OperationInvoker.js';
export type {
    HttpMethod, ParamLocation, ParamDescriptor,
    BodyDescriptor, ResponseDescriptor, OperationDescriptor,
} from './binder/types.js';

// ── Clients ──────────────────────────────────────────────
export { assembleClients } from './client/ClientAssembler.js';
export type { ClientDescriptor, AssembleOptions } from './client/ClientAssembler.js';
export { ResourceClient, ApiClient, signatureOf } from './client/ResourceClient.js';
export type { BoundMethod, ResourceClientClass, ApiClientClass, ApiInfo } from './client/ResourceClient.js';
export { resolveClientConfig, resolveBaseUrl } from './client/ClientConfig.js';
export type { ClientConfig, ResolvedClientConfig } from './client/ClientConfig.js';

// ── Transport ────────────────────────────────────────────
export { FetchTransport } from './transport/FetchTransport.js';
export type { FetchTransportOptions } from './transport/FetchTransport.js';
export type { Transport, TransportRequest, TransportResponse, TransportOptions } from './transport/Transport.js';

// ── Configuration ────────────────────────────────────────
export { DEFAULT_CONFIG, mergeConfig } from './config/BuilderConfig.js';
export type { BuilderConfig, PartialConfig, NamingConfig } from './config/BuilderConfig.js';
export { loadConfig, parseConfig } from './config/ConfigLoader.js';

// ── Observability ────────────────────────────────────────
export { createDebugObserver, resolveObserver } from './observability/DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn, DebugOption,
    BuildEvent, DegradeEvent, SkipEvent, RequestEvent, ResponseEvent, ErrorEvent,
} from './observability/DebugObserver.js';
export { SpanStatusCode } from './observability/Tracing.js';
export type { ClientTracer, ClientSpan, SpanAttributeValue } from './observability/Tracing.js';

// ── Errors ───────────────────────────────────────────────
export {
    OpenApiClientError, InvalidDocumentError, UnresolvedReferenceError,
    UnsupportedSchemaConstructError, MissingParameterError,
    NamingCollisionError, ConfigurationError,
} from './errors.js';
