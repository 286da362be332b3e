/**
 * Tracing — OpenTelemetry-Compatible Span per Call
 *
 * Minimal interfaces that are structurally compatible with
 * OpenTelemetry's `Tracer` and `Span`, so an OTel tracer can be passed
 * straight into a client config without an `@opentelemetry/*`
 * dependency:
 *
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const api = new ApiClient({ tracer: trace.getTracer('petstore-client') });
 * ```
 *
 * Each invocation opens one span named `<METHOD> <operation>`, records
 * the HTTP status and ends it in a `finally` block. Downstream spans are
 * siblings, not children: no OTel `Context` is propagated.
 *
 * @module
 */

// ── Constants ────────────────────────────────────────────

/** Matches OpenTelemetry's `SpanStatusCode` enum. */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

// ── Types ────────────────────────────────────────────────

/** Matches OpenTelemetry's `SpanAttributeValue`. */
export type SpanAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/** Structural subset of OTel's `Span`. */
export interface ClientSpan {
    setAttribute(key: string, value: SpanAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Optional: not every tracer supports events */
    addEvent?(name: string, attributes?: Record<string, SpanAttributeValue>): void;
    /** Must be called exactly once */
    end(): void;
    recordException(exception: Error | string): void;
}

/** Structural subset of OTel's `Tracer`. */
export interface ClientTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, SpanAttributeValue>;
    }): ClientSpan;
}

// ── Helpers ──────────────────────────────────────────────

/** Whether `value` looks like a tracer (has a `startSpan` method). */
export function isTracer(value: unknown): value is ClientTracer {
    return typeof value === 'object'
        && value !== null
        && 'startSpan' in value
        && typeof value.startSpan === 'function';
}

/**
 * Record a failure on `span`: 4xx replies stay `UNSET`, 5xx replies
 * and thrown errors are `ERROR`.
 */
export function recordStatus(span: ClientSpan, status: number): void {
    span.setAttribute('http.response.status_code', status);
    if (status >= 500) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: `HTTP ${status}` });
    } else if (status < 400) {
        span.setStatus({ code: SpanStatusCode.OK });
    }
}

export function recordError(span: ClientSpan, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    span.recordException(err instanceof Error ? err : message);
    span.setStatus({ code: SpanStatusCode.ERROR, message });
}
