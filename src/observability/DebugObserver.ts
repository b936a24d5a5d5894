/**
 * DebugObserver: Opt-in Observability for Hashing
 *
 * Structured, typed debug events emitted once per top-level `hash()`
 * call. When no observer is configured (the default) nothing is
 * emitted and nothing is logged.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 * - Sub-digests of map entries and set elements never emit
 *
 * @example
 * ```typescript
 * import { hash, HashFormat, createDebugObserver } from 'canonhash';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. send to telemetry)
 * const debug = createDebugObserver((event) => {
 *     telemetry.track(event.type, event);
 * });
 *
 * hash(value, HashFormat.MD5, { debug });
 * ```
 *
 * @module
 */
import { type HashErrorCode } from '../core/errors.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/**
 * Emitted after a top-level call produced its digest.
 */
export interface HashEvent {
    readonly type: 'hash';
    /** Format display name (`md5`, `sha256`, `fnv64a`) */
    readonly format: string;
    /** Size of the produced digest in bytes */
    readonly digestBytes: number;
    /** Milliseconds spent in the traversal */
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Emitted when a traversal was aborted by a `HashError`.
 */
export interface HashErrorEvent {
    readonly type: 'error';
    readonly format: string;
    readonly code: HashErrorCode;
    readonly error: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 */
export type DebugEvent = HashEvent | HashErrorEvent;

/**
 * Observer function that receives debug events.
 * Pass it as the `debug` option of `hash()`.
 */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with pretty console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler produces compact, readable output:
 *
 * ```
 * [canonhash] hash      md5 ✓ 0.2ms (16 bytes)
 * [canonhash] error     sha256 ✗ HOOK_FAILED 0.1ms: [canonhash] Order.hash() failed: boom
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[canonhash]';

        switch (event.type) {
            case 'hash':
                console.debug(`${prefix} hash      ${event.format} ✓ ${event.durationMs.toFixed(1)}ms (${event.digestBytes} bytes)`);
                break;

            case 'error':
                console.debug(`${prefix} error     ${event.format} ✗ ${event.code} ${event.durationMs.toFixed(1)}ms: ${event.error}`);
                break;
        }
    };
}
