/**
 * Capabilities: the Extensibility Protocol
 *
 * Three independent, optional interfaces a record may implement to
 * override or filter its own hashing. They are detected structurally at
 * traversal time; a record implements none, some, or all of them.
 *
 * @example
 * ```typescript
 * class Session implements Includable, IncludableMap {
 *     id = '';
 *     lastSeen = new Date();
 *     labels = new Map<string, string>();
 *
 *     hashInclude(field: string): boolean {
 *         return field !== 'lastSeen';
 *     }
 *
 *     hashIncludeMap(field: string, key: unknown): boolean {
 *         return !(field === 'labels' && String(key).startsWith('tmp.'));
 *     }
 * }
 * ```
 *
 * @module
 */
import { HashError, HookError, type HookName } from '../core/errors.js';

// ============================================================================
// Capability Interfaces
// ============================================================================

/**
 * Self-hashing: the record fully owns its representation. The
 * returned integer is written as decimal text and no field is visited;
 * `NaN`, infinities and fractions fail with a `HookError`.
 */
export interface Hashable {
    hash(): number | bigint;
}

/**
 * Field filter: called once per visible field with the (possibly
 * `toString()`-rendered) value. Return `false` to leave the field out.
 */
export interface Includable {
    hashInclude(field: string, value: unknown): boolean;
}

/**
 * Entry filter for keyed collections held by the record's fields.
 * Return `false` to leave the entry out.
 */
export interface IncludableMap {
    hashIncludeMap(field: string, key: unknown, value: unknown): boolean;
}

/** A value rendered through its own `toString()`. */
export interface Stringer {
    toString(): string;
}

// ============================================================================
// Checks
// ============================================================================

export function isHashable(value: object): value is Hashable {
    return 'hash' in value && typeof value.hash === 'function';
}

export function isIncludable(value: object): value is Includable {
    return 'hashInclude' in value && typeof value.hashInclude === 'function';
}

export function isIncludableMap(value: object): value is IncludableMap {
    return 'hashIncludeMap' in value && typeof value.hashIncludeMap === 'function';
}

// Prototypes whose toString() does not count as a text rendering of its own.
const BUILTIN_PROTOTYPES: ReadonlySet<object> = new Set<object>([
    Object.prototype,
    Function.prototype,
    Array.prototype,
    Object.getPrototypeOf(Uint8Array.prototype),
    Date.prototype,
    RegExp.prototype,
    Error.prototype,
    Map.prototype,
    Set.prototype,
    Number.prototype,
    String.prototype,
    Boolean.prototype,
    BigInt.prototype,
    Symbol.prototype,
]);

/**
 * A value is text-renderable when it is an object whose `toString`
 * comes from a user-defined prototype or the instance itself.
 */
export function isStringer(value: unknown): value is Stringer {
    if (typeof value !== 'object' || value === null) return false;

    for (let owner: object | null = value; owner !== null; owner = Object.getPrototypeOf(owner)) {
        if (Object.prototype.hasOwnProperty.call(owner, 'toString')) {
            return !BUILTIN_PROTOTYPES.has(owner) && typeof Reflect.get(owner, 'toString') === 'function';
        }
    }
    return false;
}

// ============================================================================
// Invocation
// ============================================================================

/**
 * Run an extensibility hook, wrapping anything it throws in a
 * {@link HookError}. Errors raised by a nested `hash()` call inside
 * the hook pass through unchanged.
 */
export function invokeHook<T>(hook: HookName, typeName: string, fn: () => T): T {
    try {
        return fn();
    } catch (err) {
        if (err instanceof HashError) throw err;
        throw new HookError(hook, typeName, err);
    }
}
