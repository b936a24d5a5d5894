/**
 * HashFormat: Algorithm Selector
 *
 * The closed set of digest backends. Different formats produce
 * different digests for the same value. The zero value is reserved
 * as "unset" and is never a valid selector.
 *
 * @example
 * ```typescript
 * import { hash, HashFormat } from 'canonhash';
 *
 * hash(value, HashFormat.MD5);     // 16 bytes
 * hash(value, HashFormat.SHA256);  // 32 bytes
 * hash(value, HashFormat.FNV64A);  //  8 bytes, non-cryptographic
 * ```
 *
 * @module
 */
import { type DigestSink, NodeDigestSink } from '../digest/DigestSink.js';
import { Fnv1a64 } from '../digest/Fnv1a64.js';

export enum HashFormat {
    /** MD5: 128-bit cryptographic digest */
    MD5 = 1,
    /** SHA-256: 256-bit cryptographic digest */
    SHA256 = 2,
    /** FNV-1a 64: fast non-cryptographic checksum */
    FNV64A = 3,
}

// Bounds of the enum, exclusive on both ends.
const FORMAT_INVALID = 0;
const FORMAT_MAX = 4;

interface FormatEntry {
    readonly name: string;
    readonly length: number;
    readonly create: () => DigestSink;
}

const FORMATS: Readonly<Record<HashFormat, FormatEntry>> = {
    [HashFormat.MD5]: { name: 'md5', length: 16, create: () => new NodeDigestSink('md5') },
    [HashFormat.SHA256]: { name: 'sha256', length: 32, create: () => new NodeDigestSink('sha256') },
    [HashFormat.FNV64A]: { name: 'fnv64a', length: 8, create: () => new Fnv1a64() },
};

/**
 * Check that an untrusted value is a supported `HashFormat`.
 */
export function isHashFormat(value: unknown): value is HashFormat {
    return typeof value === 'number'
        && Number.isInteger(value)
        && value > FORMAT_INVALID
        && value < FORMAT_MAX;
}

/** Create a fresh digest accumulator for a format. */
export function createDigestSink(format: HashFormat): DigestSink {
    return FORMATS[format].create();
}

/** Size in bytes of the digests a format produces. */
export function digestLength(format: HashFormat): number {
    return FORMATS[format].length;
}

/** Lowercase display name (`md5`, `sha256`, `fnv64a`). */
export function formatName(format: HashFormat): string {
    return FORMATS[format].name;
}
