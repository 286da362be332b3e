/**
 * Errors — Build-Time and Call-Time Failure Taxonomy
 *
 * Build failures (`InvalidDocumentError`, `UnresolvedReferenceError`,
 * `ConfigurationError`) abort the whole build. `MissingParameterError`
 * fails a single call. `UnsupportedSchemaConstructError` is never thrown
 * out of a build: it travels inside a `degrade` debug event.
 *
 * @module
 */

/** Base class of every error raised by this library. */
export class OpenApiClientError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'OpenApiClientError';
    }
}

/** The input is not an OpenAPI 3.x document. */
export class InvalidDocumentError extends OpenApiClientError {
    /** Individual problems found while checking the document shape. */
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'InvalidDocumentError';
        this.issues = Object.freeze([...issues]);
    }
}

/** A `$ref` pointer that does not lead to exactly one node of the document. */
export class UnresolvedReferenceError extends OpenApiClientError {
    readonly pointer: string;

    constructor(pointer: string, reason = 'pointer does not exist in the document') {
        super(`Unresolved reference "${pointer}": ${reason}`);
        this.name = 'UnresolvedReferenceError';
        this.pointer = pointer;
    }
}

/**
 * A schema construct outside the supported subset.
 * Recovered locally: the field or parameter becomes opaque.
 */
export class UnsupportedSchemaConstructError extends OpenApiClientError {
    /** Where the construct was found (JSON pointer or `Type.field`). */
    readonly location: string;
    /** Short name of the construct, e.g. `oneOf`, `not`, `type:file`. */
    readonly construct: string;

    constructor(location: string, construct: string) {
        super(`Unsupported schema construct "${construct}" at ${location}`);
        this.name = 'UnsupportedSchemaConstructError';
        this.location = location;
        this.construct = construct;
    }
}

/** A required argument was not supplied to an operation call. */
export class MissingParameterError extends OpenApiClientError {
    readonly operation: string;
    readonly parameter: string;
    readonly location: string;

    constructor(operation: string, parameter: string, location: string) {
        super(`${operation}: missing required ${location} parameter "${parameter}"`);
        this.name = 'MissingParameterError';
        this.operation = operation;
        this.parameter = parameter;
        this.location = location;
    }
}

/** Two source names were registered under the same translated name. */
export class NamingCollisionError extends OpenApiClientError {
    readonly translated: string;

    constructor(translated: string, existing: string, incoming: string) {
        super(`"${incoming}" and "${existing}" both translate to "${translated}"`);
        this.name = 'NamingCollisionError';
        this.translated = translated;
    }
}

/** Invalid builder or client configuration. */
export class ConfigurationError extends OpenApiClientError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
