/**
 * DebugObserver — Opt-In Observability for the Client Builder
 *
 * Structured, typed debug events emitted while a document is built into
 * clients and while operations are invoked. When no observer is passed
 * nothing is emitted and no event objects are allocated.
 *
 * @example
 * ```typescript
 * import { buildClientModule, createDebugObserver } from 'openapi-runtime-client';
 *
 * // Default: pretty console.debug output
 * const mod = buildClientModule(doc, { debug: createDebugObserver() });
 *
 * // Custom handler (e.g. forward to a log pipeline)
 * const mod = buildClientModule(doc, {
 *     debug: (event) => logger.info(event),
 * });
 * ```
 *
 * @module
 */
import type { UnsupportedSchemaConstructError } from '../errors.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/**
 * Emitted once per successful build, after every type, operation and
 * client class exists.
 */
export interface BuildEvent {
    readonly type: 'build';
    readonly title: string;
    readonly types: number;
    readonly operations: number;
    readonly groups: number;
    /** Milliseconds spent in the whole build pass */
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Emitted when a schema construct degrades to an opaque field.
 * The build continues.
 */
export interface DegradeEvent {
    readonly type: 'degrade';
    readonly location: string;
    readonly construct: string;
    readonly error: UnsupportedSchemaConstructError;
    readonly timestamp: number;
}

/** Emitted when a malformed declaration (parameter, path item) is ignored. */
export interface SkipEvent {
    readonly type: 'skip';
    readonly location: string;
    readonly reason: string;
    readonly timestamp: number;
}

/** Emitted right before the transport is called. */
export interface RequestEvent {
    readonly type: 'request';
    readonly operation: string;
    readonly method: string;
    readonly url: string;
    readonly timestamp: number;
}

/** Emitted after the transport answered. */
export interface ResponseEvent {
    readonly type: 'response';
    readonly operation: string;
    readonly status: number;
    /** Whether the payload was marshalled into a model */
    readonly typed: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Emitted when a call fails. The error itself is rethrown to the caller
 * unchanged; this event only records it.
 */
export interface ErrorEvent {
    readonly type: 'error';
    readonly operation: string;
    readonly error: string;
    /** The invocation step where the error occurred */
    readonly step: 'prepare' | 'transport';
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * Use a `switch` on `event.type` for exhaustive handling.
 */
export type DebugEvent =
    | BuildEvent
    | DegradeEvent
    | SkipEvent
    | RequestEvent
    | ResponseEvent
    | ErrorEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

/** What configs accept: `true` selects the default console observer. */
export type DebugOption = boolean | DebugObserverFn;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output:
 *
 * ```
 * [openapi-client] build     Petstore 3 types, 4 operations, 2 groups 1.2ms
 * [openapi-client] request   pets.getPet GET https://api.example.com/pets/42
 * [openapi-client] response  pets.getPet 200 typed 12.0ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[openapi-client]';

        switch (event.type) {
            case 'build':
                console.debug(
                    `${prefix} build     ${event.title} ${event.types} types, ${event.operations} operations, ${event.groups} groups ${event.durationMs.toFixed(1)}ms`,
                );
                break;

            case 'degrade':
                console.debug(`${prefix} degrade   ${event.location} (${event.construct})`);
                break;

            case 'skip':
                console.debug(`${prefix} skip      ${event.location}: ${event.reason}`);
                break;

            case 'request':
                console.debug(`${prefix} request   ${event.operation} ${event.method} ${event.url}`);
                break;

            case 'response': {
                const kind = event.typed ? 'typed' : 'raw';
                console.debug(`${prefix} response  ${event.operation} ${event.status} ${kind} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'error':
                console.debug(`${prefix} ERROR     ${event.operation} [${event.step}] ${event.error}`);
                break;
        }
    };
}

/** Turn a config's `debug` option into an observer, or `undefined` when disabled. */
export function resolveObserver(option: DebugOption | undefined): DebugObserverFn | undefined {
    if (option === undefined || option === false) return undefined;
    if (option === true) return createDebugObserver();
    return option;
}
