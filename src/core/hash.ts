/**
 * hash(): Top-Level Entry Point
 *
 * Validates the algorithm selector, resolves options, and drives one
 * traversal of the value into a fresh digest accumulator. Each call
 * owns its own walker; concurrent callers share nothing but the
 * frozen options they pass in.
 *
 * @example
 * ```typescript
 * import { hash, hashHex, tryHash, HashFormat } from 'canonhash';
 *
 * const digest = hash({ name: 'widget', tags: ['a', 'b'] }, HashFormat.MD5);
 * // Uint8Array(16)
 *
 * const key = hashHex(request, HashFormat.SHA256);
 * // '9f86d081884c7d65...'
 *
 * const result = tryHash(value, HashFormat.FNV64A, { zeroNil: true });
 * if (!result.ok) console.warn(result.error.code);
 * ```
 *
 * Notes on values:
 *
 * - Plain objects and `Map`s are keyed collections: entry order never matters.
 * - Arrays are ordered unless the field is tagged `set` (or `slicesAsSets`).
 * - Class instances are records; register them with `defineRecord()` to
 *   control which fields are visible and how they are tagged.
 * - Cyclic values are not detected.
 *
 * @module
 */
import { HashError, InvalidFormatError } from './errors.js';
import { type HashFormat, digestLength, formatName, isHashFormat } from './HashFormat.js';
import { type HashOptions, resolveHashOptions } from './HashOptions.js';
import { type Result, succeed, fail } from './result.js';
import { hashValue } from '../walker/Walker.js';

/**
 * Compute the digest of an arbitrary value.
 *
 * @param value - Any value graph
 * @param format - Digest backend; anything outside `HashFormat` is rejected
 * @param options - Optional configuration, see {@link HashOptions}
 * @returns The digest; its length is fixed by the format
 *
 * @throws {InvalidFormatError} before any traversal, for an invalid selector
 * @throws {HashError} for any failure during the traversal
 */
export function hash(value: unknown, format: HashFormat, options?: HashOptions): Uint8Array {
    if (!isHashFormat(format)) {
        throw new InvalidFormatError(format);
    }

    const resolved = resolveHashOptions(options);
    const { debug } = resolved;
    const startTime = debug ? performance.now() : 0;

    try {
        const digest = hashValue(value, format, resolved);
        debug?.({
            type: 'hash',
            format: formatName(format),
            digestBytes: digestLength(format),
            durationMs: performance.now() - startTime,
            timestamp: Date.now(),
        });
        return digest;
    } catch (err) {
        if (debug && err instanceof HashError) {
            debug({
                type: 'error',
                format: formatName(format),
                code: err.code,
                error: err.message,
                durationMs: performance.now() - startTime,
                timestamp: Date.now(),
            });
        }
        throw err;
    }
}

/**
 * Like {@link hash}, returning a {@link Result} instead of throwing.
 * Only `HashError`s become failures; anything else is rethrown.
 */
export function tryHash(value: unknown, format: HashFormat, options?: HashOptions): Result<Uint8Array> {
    try {
        return succeed(hash(value, format, options));
    } catch (err) {
        if (err instanceof HashError) return fail(err);
        throw err;
    }
}

/**
 * Like {@link hash}, returning the digest as lowercase hex.
 */
export function hashHex(value: unknown, format: HashFormat, options?: HashOptions): string {
    return Buffer.from(hash(value, format, options)).toString('hex');
}
