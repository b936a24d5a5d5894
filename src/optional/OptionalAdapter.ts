/**
 * OptionalAdapter: Closed Unboxing Table for Optional Values
 *
 * One adapter per {@link OptionalKind}. Each knows its kind's zero
 * payload and how to encode a present payload with the same widths as
 * scalars: integers widen to 64 bits after a range check against the
 * declared width, floats widen to float64, booleans take one byte.
 * Text kinds carry a prefix so that no present value can collide with
 * the `nil` sentinel written for an absent one.
 *
 * | state                          | contribution             |
 * |--------------------------------|--------------------------|
 * | absent, `zeroNil`              | zero payload, encoded    |
 * | absent, `ignoreZeroValue`      | nothing                  |
 * | absent                         | `nil`                    |
 * | present zero, `ignoreZeroValue`| nothing                  |
 * | present                        | payload, encoded         |
 *
 * @module
 * @internal
 */
import { UnsupportedValueError } from '../core/errors.js';
import { type ResolvedHashOptions } from '../core/HashOptions.js';
import {
    encodeBool, encodeFloat64, encodeInt64, encodeText, encodeUint64,
} from '../walker/PrimitiveEncoder.js';
import { invokeHook } from '../record/capabilities.js';
import { resolveRecordSchema } from '../record/defineRecord.js';
import { type OptionalKind, type OptionalValue, OPTIONAL_KIND } from './OptionalValue.js';

// ============================================================================
// Adapter Contract
// ============================================================================

interface OptionalAdapter {
    /** Payload substituted for an absent value under `zeroNil` */
    readonly zero: unknown;
    isZero(payload: unknown): boolean;
    /** @throws {UnsupportedValueError} when the payload does not fit the kind */
    encode(payload: unknown): Uint8Array;
}

/** Written for an absent value. Three bytes: no scalar encoding has that width. */
const NIL_SENTINEL = encodeText('nil');

// ============================================================================
// Adapter Families
// ============================================================================

function textAdapter(prefix: string, render: (payload: unknown) => string | undefined, zero: unknown): OptionalAdapter {
    return {
        zero,
        isZero: payload => render(payload) === '',
        encode: payload => {
            const text = render(payload);
            if (text === undefined) {
                throw new UnsupportedValueError(typeof payload, `not a valid ${prefix} payload`);
            }
            return encodeText(prefix + text);
        },
    };
}

function signedAdapter(kind: OptionalKind, bits: bigint): OptionalAdapter {
    const min = -(2n ** (bits - 1n));
    const max = 2n ** (bits - 1n) - 1n;
    return {
        zero: 0,
        isZero: payload => toInteger(payload) === 0n,
        encode: payload => encodeInt64(checkRange(kind, payload, min, max)),
    };
}

function unsignedAdapter(kind: OptionalKind, bits: bigint): OptionalAdapter {
    const max = 2n ** bits - 1n;
    return {
        zero: 0,
        isZero: payload => toInteger(payload) === 0n,
        encode: payload => encodeUint64(checkRange(kind, payload, 0n, max)),
    };
}

function floatAdapter(kind: OptionalKind, round: (value: number) => number): OptionalAdapter {
    return {
        zero: 0,
        isZero: payload => typeof payload === 'number' && Object.is(payload, 0),
        encode: payload => {
            if (typeof payload !== 'number') {
                throw new UnsupportedValueError(typeof payload, `optional ${kind} holds a non-number`);
            }
            return encodeFloat64(round(payload));
        },
    };
}

const boolAdapter: OptionalAdapter = {
    zero: false,
    isZero: payload => payload === false,
    encode: payload => {
        if (typeof payload !== 'boolean') {
            throw new UnsupportedValueError(typeof payload, 'optional bool holds a non-boolean');
        }
        return encodeBool(payload);
    },
};

// ============================================================================
// Table
// ============================================================================

const ADAPTERS: Readonly<Record<OptionalKind, OptionalAdapter>> = {
    string: textAdapter('string', payload => (typeof payload === 'string' ? payload : undefined), ''),
    error: textAdapter('error', payload => (payload instanceof Error ? payload.message : undefined), new Error('')),
    bool: boolAdapter,
    int: signedAdapter('int', 64n),
    int8: signedAdapter('int8', 8n),
    int16: signedAdapter('int16', 16n),
    int32: signedAdapter('int32', 32n),
    int64: signedAdapter('int64', 64n),
    uint: unsignedAdapter('uint', 64n),
    uint8: unsignedAdapter('uint8', 8n),
    uint16: unsignedAdapter('uint16', 16n),
    uint32: unsignedAdapter('uint32', 32n),
    uint64: unsignedAdapter('uint64', 64n),
    float32: floatAdapter('float32', Math.fround),
    float64: floatAdapter('float64', value => value),
};

// ============================================================================
// Unboxing
// ============================================================================

/**
 * Encode an optional value, or return `undefined` when it contributes
 * nothing to the digest.
 */
export function encodeOptional(optional: OptionalValue, options: ResolvedHashOptions): Uint8Array | undefined {
    const adapter = ADAPTERS[optional[OPTIONAL_KIND]];

    if (!isOptionalPresent(optional)) {
        if (options.zeroNil) return adapter.encode(adapter.zero);
        if (options.ignoreZeroValue) return undefined;
        return NIL_SENTINEL;
    }

    const payload = invokeHook('orElse', optionalTypeName(optional), () => optional.orElse(adapter.zero));
    if (options.ignoreZeroValue && adapter.isZero(payload)) return undefined;
    return adapter.encode(payload);
}

/** `isPresent()`, with anything it throws wrapped in a `HookError`. */
export function isOptionalPresent(optional: OptionalValue): boolean {
    return invokeHook('isPresent', optionalTypeName(optional), () => optional.isPresent());
}

// ============================================================================
// Internals
// ============================================================================

function optionalTypeName(optional: OptionalValue): string {
    return resolveRecordSchema(optional).typeName;
}

function toInteger(payload: unknown): bigint | undefined {
    if (typeof payload === 'bigint') return payload;
    if (typeof payload === 'number' && Number.isInteger(payload)) return BigInt(payload);
    return undefined;
}

function checkRange(kind: OptionalKind, payload: unknown, min: bigint, max: bigint): bigint {
    const value = toInteger(payload);
    if (value === undefined || value < min || value > max) {
        throw new UnsupportedValueError(typeof payload, `${String(payload)} does not fit optional ${kind}`);
    }
    return value;
}
