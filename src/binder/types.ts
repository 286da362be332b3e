/**
 * Operation Descriptor Types
 *
 * One {@link OperationDescriptor} per declared operation. Descriptors
 * are frozen at the end of the build and shared by every client
 * instance; invocation never mutates them.
 *
 * @module
 */
import type { ReadonlyNameMap } from '../naming/NamingTranslator.js';
import type { FieldType } from '../schema/types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS' | 'TRACE';

/** Where a parameter goes in the request. The body is described separately. */
export type ParamLocation = 'path' | 'query' | 'header' | 'cookie';

export interface ParamDescriptor {
    /** Name on the wire (as declared in the document) */
    readonly name: string;
    /** Idiomatic call-argument name */
    readonly argName: string;
    readonly location: ParamLocation;
    /** Always `true` for path parameters */
    readonly required: boolean;
    readonly type: FieldType;
    readonly description?: string;
    /** Query arrays: repeat the key (`true`) or join with commas (`false`) */
    readonly explode: boolean;
}

export interface BodyDescriptor {
    /** Call-argument name, `body` unless a parameter already took it */
    readonly argName: string;
    readonly mediaType: string;
    readonly required: boolean;
    readonly type: FieldType;
    readonly description?: string;
}

export interface ResponseDescriptor {
    /** Status key the schema was taken from (`200`, `2XX`, `default`) */
    readonly status: string;
    readonly mediaType: string;
    readonly type: FieldType;
}

export interface OperationDescriptor {
    readonly operationId?: string;
    /** Idiomatic method name, before per-group deduplication */
    readonly name: string;
    readonly method: HttpMethod;
    /** Path template with `{name}` placeholders */
    readonly path: string;
    /** Resource/tag group key as written in the document */
    readonly group: string;
    readonly summary?: string;
    readonly description?: string;
    readonly deprecated: boolean;
    /** Path-level parameters first, then operation-level ones */
    readonly params: readonly ParamDescriptor[];
    readonly body?: BodyDescriptor;
    /** Absent when the reply stays untyped */
    readonly response?: ResponseDescriptor;
    /** Argument name ↔ wire name */
    readonly names: ReadonlyNameMap;
}
