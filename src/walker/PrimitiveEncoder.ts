/**
 * PrimitiveEncoder: Canonical Bytes for Scalars
 *
 * Numbers are widened to one width per family before encoding, so
 * equal values of the same family always produce the same bytes:
 *
 *   signed   → int64   little-endian
 *   unsigned → uint64  little-endian
 *   float    → float64 little-endian (IEEE-754)
 *   boolean  → one byte, 0 or 1
 *   text     → raw UTF-8, no length prefix, no terminator
 *
 * Timestamps use their own 15-byte binary form (see {@link encodeTimestamp}).
 *
 * @module
 * @internal
 */
import { TimestampEncodingError, UnsupportedValueError } from '../core/errors.js';
import { type ValueType } from '../record/defineRecord.js';

// ============================================================================
// Constants
// ============================================================================

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;
export const UINT64_MAX = 2n ** 64n - 1n;

/** Seconds from 0001-01-01T00:00:00Z to the Unix epoch. */
const SECONDS_TO_UNIX_EPOCH = 62_135_596_800n;

/** Version byte of the timestamp encoding. */
const TIMESTAMP_VERSION = 1;

/** Zone offset (minutes) written for UTC. */
const UTC_OFFSET_MARKER = -1;

/** 0001-01-01T00:00:00Z: the zero timestamp. */
export const ZERO_TIME_MS = -62_135_596_800_000;

const textEncoder = new TextEncoder();

// ============================================================================
// Scalars
// ============================================================================

export function encodeText(text: string): Uint8Array {
    return textEncoder.encode(text);
}

export function encodeBool(value: boolean): Uint8Array {
    return Uint8Array.of(value ? 1 : 0);
}

export function encodeInt64(value: bigint): Uint8Array {
    if (value < INT64_MIN || value > INT64_MAX) {
        throw new UnsupportedValueError('bigint', `${value} does not fit in int64`);
    }
    const out = Buffer.alloc(8);
    out.writeBigInt64LE(value);
    return out;
}

export function encodeUint64(value: bigint): Uint8Array {
    if (value < 0n || value > UINT64_MAX) {
        throw new UnsupportedValueError('bigint', `${value} does not fit in uint64`);
    }
    const out = Buffer.alloc(8);
    out.writeBigUInt64LE(value);
    return out;
}

export function encodeFloat64(value: number): Uint8Array {
    const out = Buffer.alloc(8);
    out.writeDoubleLE(value);
    return out;
}

/**
 * Encode a `number`. A declared `'int'` / `'uint'` / `'float'` type
 * selects the family. Untyped integers follow the `bigint` rules as
 * long as they fit in 64 bits; every other number is floating point.
 */
export function encodeNumber(value: number, type?: ValueType): Uint8Array {
    switch (type) {
        case 'float':
            return encodeFloat64(value);

        case 'int':
            if (!Number.isInteger(value)) {
                throw new UnsupportedValueError('number', `${value} is not an integer`);
            }
            return encodeInt64(BigInt(value));

        case 'uint':
            if (!Number.isInteger(value) || value < 0) {
                throw new UnsupportedValueError('number', `${value} is not an unsigned integer`);
            }
            return encodeUint64(BigInt(value));

        default:
            return isInteger64(value)
                ? encodeBigInt(BigInt(value))
                : encodeFloat64(value);
    }
}

function isInteger64(value: number): boolean {
    if (!Number.isInteger(value)) return false;
    const integer = BigInt(value);
    return integer >= INT64_MIN && integer <= UINT64_MAX;
}

/**
 * Encode a `bigint`. Untyped values are signed when they fit in int64
 * and unsigned when they only fit in uint64.
 */
export function encodeBigInt(value: bigint, type?: ValueType): Uint8Array {
    switch (type) {
        case 'float':
            return encodeFloat64(Number(value));
        case 'uint':
            return encodeUint64(value);
        case 'int':
            return encodeInt64(value);
        default:
            return value > INT64_MAX ? encodeUint64(value) : encodeInt64(value);
    }
}

// ============================================================================
// Timestamps
// ============================================================================

/**
 * Canonical binary form of a `Date`, 15 bytes:
 *
 *   [0]      version (1)
 *   [1..8]   seconds since 0001-01-01T00:00:00Z, int64 big-endian
 *   [9..12]  nanoseconds within the second, uint32 big-endian
 *   [13..14] zone offset in minutes, int16 big-endian (-1 = UTC)
 *
 * @throws {TimestampEncodingError} for an invalid `Date`
 */
export function encodeTimestamp(date: Date): Uint8Array {
    const ms = date.getTime();
    if (Number.isNaN(ms)) {
        throw new TimestampEncodingError('invalid Date');
    }

    const seconds = Math.floor(ms / 1000);
    const nanos = (ms - seconds * 1000) * 1_000_000;

    const out = Buffer.alloc(15);
    out.writeUInt8(TIMESTAMP_VERSION, 0);
    out.writeBigInt64BE(BigInt(seconds) + SECONDS_TO_UNIX_EPOCH, 1);
    out.writeUInt32BE(nanos, 9);
    out.writeInt16BE(UTC_OFFSET_MARKER, 13);
    return out;
}
