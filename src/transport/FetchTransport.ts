/**
 * FetchTransport — Default Transport over `fetch`
 *
 * Turns a {@link TransportRequest} into one `fetch` call and the reply
 * back into a {@link TransportResponse}. Status codes are reported, never
 * interpreted: a 404 is a normal response here.
 *
 * Recognized per-call options:
 * - `timeoutMs` — abort after this many milliseconds
 * - `signal` — caller-owned `AbortSignal` (wins over `timeoutMs`)
 *
 * @module
 */
import { isRecord } from '../parser/types.js';
import type { Transport, TransportOptions, TransportRequest, TransportResponse } from './Transport.js';

// ── Types ────────────────────────────────────────────────

export interface FetchTransportOptions {
    /** Custom fetch implementation (default: `globalThis.fetch`) */
    readonly fetchFn?: typeof fetch;
    /** Default timeout applied when a call passes none */
    readonly timeoutMs?: number;
}

// ── Transport ────────────────────────────────────────────

export class FetchTransport implements Transport {
    private readonly fetchFn: typeof fetch;
    private readonly timeoutMs: number | undefined;

    constructor(options: FetchTransportOptions = {}) {
        this.fetchFn = options.fetchFn ?? globalThis.fetch;
        this.timeoutMs = options.timeoutMs;
    }

    async execute(request: TransportRequest, options: TransportOptions): Promise<TransportResponse> {
        const init: RequestInit = {
            method: request.method,
            headers: { ...request.headers },
        };

        const body = encodeBody(request.body, request.mediaType);
        if (body !== undefined) {
            init.body = body;
        }

        const signal = this.signalFor(options);
        if (signal) {
            init.signal = signal;
        }

        const response = await this.fetchFn(appendQuery(request.url, request.query), init);

        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            headers[key] = value;
        });

        return {
            status: response.status,
            headers,
            body: await decodeBody(response, request.method),
        };
    }

    private signalFor(options: TransportOptions): AbortSignal | undefined {
        const signal = options['signal'];
        if (signal instanceof AbortSignal) return signal;

        const timeout = options['timeoutMs'];
        const ms = typeof timeout === 'number' ? timeout : this.timeoutMs;
        return ms !== undefined ? AbortSignal.timeout(ms) : undefined;
    }
}

// ── Helpers ──────────────────────────────────────────────

/** Append query pairs to a URL, keeping any query already present. */
export function appendQuery(url: string, query: ReadonlyArray<readonly [string, string]>): string {
    if (query.length === 0) return url;

    const params = new URLSearchParams();
    for (const [key, value] of query) {
        params.append(key, value);
    }
    return `${url}${url.includes('?') ? '&' : '?'}${params.toString()}`;
}

/**
 * Encode a body for the wire.
 * JSON media types are stringified, form media types URL-encoded,
 * strings and binary data sent as-is.
 */
export function encodeBody(body: unknown, mediaType: string | undefined): string | Uint8Array | undefined {
    if (body === undefined) return undefined;
    if (typeof body === 'string') return body;
    if (body instanceof Uint8Array) return body;

    if (mediaType === 'application/x-www-form-urlencoded' && isRecord(body)) {
        const params = new URLSearchParams();
        for (const [key, value] of Object.entries(body)) {
            if (value === undefined || value === null) continue;
            params.append(key, typeof value === 'object' ? JSON.stringify(value) : String(value));
        }
        return params.toString();
    }

    return JSON.stringify(body);
}

async function decodeBody(response: Response, method: string): Promise<unknown> {
    if (method === 'HEAD' || response.status === 204) return undefined;

    const text = await response.text();
    if (text.length === 0) return undefined;

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('json')) {
        return parseJsonOr(text);
    }
    return text;
}

function parseJsonOr(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}
