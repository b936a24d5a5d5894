/**
 * Result\<T\>: Railway-Oriented Hashing
 *
 * A lightweight discriminated union for callers that prefer
 * branching over exception handling. Returned by {@link tryHash}.
 *
 * @example
 * ```typescript
 * import { tryHash, HashFormat } from 'canonhash';
 *
 * const result = tryHash(config, HashFormat.SHA256);
 * if (!result.ok) {
 *     console.warn(result.error.code);   // Failure path
 *     return;
 * }
 * const digest = result.value;           // Success path: Uint8Array
 * ```
 *
 * @module
 */
import { type HashError } from './errors.js';

// ── Discriminated Union ──────────────────────────────────

/**
 * Successful result containing a typed value.
 *
 * @typeParam T - The success value type
 */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/**
 * Failed result carrying the error that aborted the traversal.
 */
export interface Failure {
    readonly ok: false;
    readonly error: HashError;
}

/**
 * Either `Success<T>` or `Failure`. Check `result.ok` to narrow.
 */
export type Result<T> = Success<T> | Failure;

// ── Constructors ─────────────────────────────────────────

/**
 * Create a successful result.
 *
 * @example
 * ```typescript
 * return succeed(digest);
 * ```
 */
export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

/**
 * Create a failed result from a {@link HashError}.
 */
export function fail(error: HashError): Failure {
    return { ok: false, error };
}
