/**
 * DigestSink: Incremental Hash Accumulator
 *
 * The only surface the walker needs from a digest algorithm:
 * feed bytes, then finalize once. Cryptographic backends delegate
 * to `node:crypto`; the FNV-1a backend lives in `Fnv1a64.ts`.
 *
 * @module
 */
import { createHash, type Hash } from 'node:crypto';

/**
 * Incremental digest accumulator.
 *
 * `digest()` finalizes the accumulator; calling `update()` or
 * `digest()` afterwards is not supported.
 */
export interface DigestSink {
    update(bytes: Uint8Array): void;
    digest(): Uint8Array;
}

/** Algorithms served by `node:crypto`. */
export type NodeDigestAlgorithm = 'md5' | 'sha256';

/**
 * DigestSink backed by a `node:crypto` {@link Hash}.
 */
export class NodeDigestSink implements DigestSink {
    private readonly _hash: Hash;

    constructor(algorithm: NodeDigestAlgorithm) {
        this._hash = createHash(algorithm);
    }

    update(bytes: Uint8Array): void {
        this._hash.update(bytes);
    }

    digest(): Uint8Array {
        return this._hash.digest();
    }
}
