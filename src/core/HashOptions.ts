/**
 * HashOptions: Per-Call Configuration
 *
 * Options are validated with a strict zod schema, defaults are applied,
 * and the resolved object is frozen for the duration of the call.
 * Omitting the options object entirely is the same as passing `{}`.
 *
 * @example
 * ```typescript
 * hash(value, HashFormat.MD5, {
 *     zeroNil: true,          // absent typed fields hash like their zero value
 *     ignoreZeroValue: true,  // skip zero-valued record fields
 * });
 * ```
 *
 * @module
 */
import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';

// ============================================================================
// Types
// ============================================================================

/** Options accepted by `hash()`, `tryHash()` and `hashHex()`. */
export interface HashOptions {
    /**
     * Metadata key whose field tags are read. Default: `"hash"`.
     * An empty string also selects `"hash"`.
     */
    readonly tagName?: string | undefined;

    /**
     * Treat an absent value as the zero value of its declared field type.
     * Default: `false`.
     */
    readonly zeroNil?: boolean | undefined;

    /** Skip record fields holding their zero value. Default: `false`. */
    readonly ignoreZeroValue?: boolean | undefined;

    /** Hash every array as if it were tagged `set`. Default: `false`. */
    readonly slicesAsSets?: boolean | undefined;

    /**
     * Hash text-renderable field values through their `toString()`.
     * A field explicitly tagged `string` still fails when its value is
     * not renderable. Default: `false`.
     */
    readonly useStringer?: boolean | undefined;

    /** Debug observer notified once per top-level call. */
    readonly debug?: DebugObserverFn | undefined;
}

/** Options after validation and defaulting. */
export interface ResolvedHashOptions {
    readonly tagName: string;
    readonly zeroNil: boolean;
    readonly ignoreZeroValue: boolean;
    readonly slicesAsSets: boolean;
    readonly useStringer: boolean;
    readonly debug?: DebugObserverFn | undefined;
}

// ============================================================================
// Schema
// ============================================================================

/** Default metadata key for field tags. */
export const DEFAULT_TAG_NAME = 'hash';

export const HashOptionsSchema = z.object({
    tagName: z.string()
        .optional()
        .transform(name => (name === undefined || name === '' ? DEFAULT_TAG_NAME : name)),
    zeroNil: z.boolean().default(false),
    ignoreZeroValue: z.boolean().default(false),
    slicesAsSets: z.boolean().default(false),
    useStringer: z.boolean().default(false),
    debug: z.custom<DebugObserverFn>(
        value => typeof value === 'function',
        { message: 'Expected a function' },
    ).optional(),
}).strict();

// ============================================================================
// Resolution
// ============================================================================

/**
 * Validate and default a caller-supplied options object.
 *
 * @throws {InvalidOptionsError} when the options fail validation
 */
export function resolveHashOptions(options?: HashOptions): ResolvedHashOptions {
    const parsed = HashOptionsSchema.safeParse(options ?? {});
    if (!parsed.success) {
        throw new InvalidOptionsError(
            parsed.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
        );
    }

    const { tagName, zeroNil, ignoreZeroValue, slicesAsSets, useStringer, debug } = parsed.data;
    return Object.freeze({ tagName, zeroNil, ignoreZeroValue, slicesAsSets, useStringer, debug });
}
