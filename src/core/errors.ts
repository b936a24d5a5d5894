/**
 * Errors: Typed Failure Hierarchy
 *
 * Every failure raised while hashing is a `HashError` carrying a
 * machine-readable `code`. Errors are never recovered locally: the
 * first one raised aborts the whole top-level call and the partial
 * digest is discarded.
 *
 * @example
 * ```typescript
 * import { hash, HashFormat, HashError } from 'canonhash';
 *
 * try {
 *     hash(value, HashFormat.MD5);
 * } catch (err) {
 *     if (err instanceof HashError && err.code === 'NOT_STRINGER') {
 *         // a field tagged `string` has no toString() of its own
 *     }
 * }
 * ```
 *
 * @module
 */

// ============================================================================
// Codes
// ============================================================================

/**
 * Machine-readable failure codes.
 *
 * - `INVALID_FORMAT`: the algorithm selector is not a `HashFormat` member
 * - `INVALID_OPTIONS`: the options object failed validation
 * - `NOT_STRINGER`: a field tagged `string` cannot be rendered as text
 * - `UNSUPPORTED_VALUE`: the traversal reached a value with no encoding
 * - `HOOK_FAILED`: a record's `hash` / `hashInclude` / `hashIncludeMap` hook,
 *   a field's `toString()` or getter, or an optional value's accessor, failed
 * - `TIMESTAMP_ENCODING`: a `Date` could not be serialized
 */
export type HashErrorCode =
    | 'INVALID_FORMAT'
    | 'INVALID_OPTIONS'
    | 'NOT_STRINGER'
    | 'UNSUPPORTED_VALUE'
    | 'HOOK_FAILED'
    | 'TIMESTAMP_ENCODING';

/**
 * User code the walker calls into: the extensibility hooks a record may
 * implement, text rendering of a field, field getters, and the accessors
 * of an optional value.
 */
export type HookName =
    | 'hash'
    | 'hashInclude'
    | 'hashIncludeMap'
    | 'toString'
    | 'get'
    | 'isPresent'
    | 'orElse';

// ============================================================================
// Base
// ============================================================================

/**
 * Base class of every error raised by the hashing engine.
 */
export class HashError extends Error {
    readonly code: HashErrorCode;

    constructor(code: HashErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'HashError';
        this.code = code;
    }
}

// ============================================================================
// Concrete Errors
// ============================================================================

/**
 * Raised before any traversal when the algorithm selector is the
 * unset zero value or outside the supported set.
 */
export class InvalidFormatError extends HashError {
    /** The rejected selector, as received. */
    readonly format: unknown;

    constructor(format: unknown) {
        super('INVALID_FORMAT', `[canonhash] Invalid hash format: ${String(format)}`);
        this.name = 'InvalidFormatError';
        this.format = format;
    }
}

/**
 * Raised when the options object fails schema validation.
 */
export class InvalidOptionsError extends HashError {
    /** One line per validation issue (`path: message`). */
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super('INVALID_OPTIONS', `[canonhash] Invalid hash options: ${issues.join('; ')}`);
        this.name = 'InvalidOptionsError';
        this.issues = Object.freeze([...issues]);
    }
}

/**
 * Raised when a field tagged `string` holds a value that does not
 * define its own `toString()`.
 */
export class NotStringerError extends HashError {
    readonly typeName: string;
    readonly field: string;

    constructor(typeName: string, field: string) {
        super('NOT_STRINGER', `[canonhash] ${typeName}.${field} is tagged "string" but is not text-renderable`);
        this.name = 'NotStringerError';
        this.typeName = typeName;
        this.field = field;
    }
}

/**
 * Raised when the traversal reaches a value it has no encoding for
 * (functions, symbols, promises, weak collections, or a number that
 * does not fit its declared family).
 */
export class UnsupportedValueError extends HashError {
    /** Short description of the offending value kind. */
    readonly kind: string;

    constructor(kind: string, detail?: string) {
        super('UNSUPPORTED_VALUE', `[canonhash] Unknown kind to hash: ${kind}${detail ? ` (${detail})` : ''}`);
        this.name = 'UnsupportedValueError';
        this.kind = kind;
    }
}

/**
 * Wraps anything thrown by user code during the traversal: a record's
 * extensibility hook, a field getter, a `toString()` or an optional
 * value's accessor. The original error is kept as `cause`.
 */
export class HookError extends HashError {
    readonly hook: HookName;
    readonly typeName: string;

    constructor(hook: HookName, typeName: string, cause: unknown, reason?: string) {
        const detail = reason ?? (cause instanceof Error ? cause.message : String(cause));
        super('HOOK_FAILED', `[canonhash] ${typeName}.${hook}() failed: ${detail}`, { cause });
        this.name = 'HookError';
        this.hook = hook;
        this.typeName = typeName;
    }
}

/**
 * Raised when a `Date` has no canonical binary form (an invalid date).
 */
export class TimestampEncodingError extends HashError {
    constructor(detail: string) {
        super('TIMESTAMP_ENCODING', `[canonhash] Cannot encode timestamp: ${detail}`);
        this.name = 'TimestampEncodingError';
    }
}
