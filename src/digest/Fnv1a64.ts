/**
 * FNV-1a (64-bit): fast non-cryptographic digest.
 *
 * Output is the 64-bit state, big-endian (8 bytes).
 *
 * @module
 */
import { type DigestSink } from './DigestSink.js';

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

export class Fnv1a64 implements DigestSink {
    private _state = FNV_OFFSET_BASIS;

    update(bytes: Uint8Array): void {
        let state = this._state;
        for (const byte of bytes) {
            state ^= BigInt(byte);
            state = (state * FNV_PRIME) & MASK_64;
        }
        this._state = state;
    }

    digest(): Uint8Array {
        const out = Buffer.alloc(8);
        out.writeBigUInt64BE(this._state);
        return out;
    }
}
