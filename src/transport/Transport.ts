/**
 * Transport — Request Execution Capability
 *
 * The builder never opens connections itself. Every invocation ends in
 * one {@link Transport.execute} call with a fully built request; retries,
 * pooling, TLS and timeouts are the transport's business.
 *
 * @module
 */
import type { HttpMethod } from '../binder/types.js';

/** A fully built request. */
export interface TransportRequest {
    readonly method: HttpMethod;
    /** Base URL + substituted path, without the query string */
    readonly url: string;
    /** Query pairs in parameter order; a key repeats for exploded arrays */
    readonly query: ReadonlyArray<readonly [string, string]>;
    readonly headers: Readonly<Record<string, string>>;
    /** Plain wire data (models already serialized) */
    readonly body?: unknown;
    /** Media type the body must be encoded as */
    readonly mediaType?: string;
}

/** What came back. Status codes are not interpreted by the builder. */
export interface TransportResponse {
    readonly status: number;
    readonly headers: Readonly<Record<string, string>>;
    readonly body: unknown;
}

/**
 * Opaque per-call settings, passed through untouched
 * (e.g. `timeoutMs`, `signal` for the fetch transport).
 */
export type TransportOptions = Readonly<Record<string, unknown>>;

export interface Transport {
    execute(request: TransportRequest, options: TransportOptions): Promise<TransportResponse>;
}
