/**
 * CollectionCanonicalizer: Order-Independent Collections
 *
 * Keyed collections and set-like sequences are hashed as canonical
 * sets: every member is digested by an independent traversal, the
 * member digests are sorted byte-lexicographically, and the sorted
 * digests are written into the enclosing digest. No total order over
 * arbitrary keys or elements is needed.
 *
 *   Map { k1 → v1, k2 → v2 }
 *     │
 *     ├─ keys   → [H(k1), H(k2)] → sort → write all
 *     └─ values → [H(v1), H(v2)] → sort → write all
 *
 * Ordinary sequences are visited element by element, in order, straight
 * into the enclosing digest.
 *
 * @module
 * @internal
 */
import { invokeHook, isIncludableMap } from '../record/capabilities.js';
import { resolveRecordSchema } from '../record/defineRecord.js';
import { type Visitor, type VisitContext } from './VisitContext.js';

// ============================================================================
// Keyed Collections
// ============================================================================

/**
 * Hash a keyed collection. When the collection is a field of a record
 * implementing `hashIncludeMap`, each entry is offered to the hook first.
 */
export function visitKeyedCollection(
    visitor: Visitor,
    entries: Iterable<readonly [unknown, unknown]>,
    ctx?: VisitContext,
): void {
    const parent = ctx?.parent;
    const filter = parent !== undefined && isIncludableMap(parent) ? parent : undefined;
    const field = ctx?.field ?? '';
    const typeName = filter ? resolveRecordSchema(filter).typeName : '';

    const keyHashes: Uint8Array[] = [];
    const valueHashes: Uint8Array[] = [];

    for (const [key, value] of entries) {
        if (filter) {
            const include = invokeHook('hashIncludeMap', typeName, () => filter.hashIncludeMap(field, key, value));
            if (!include) continue;
        }

        keyHashes.push(visitor.subHash(key));
        valueHashes.push(visitor.subHash(value));
    }

    writeSorted(visitor, keyHashes);
    writeSorted(visitor, valueHashes);
}

// ============================================================================
// Sequences
// ============================================================================

/**
 * Hash an ordered sequence. Behaves as a set when the field is tagged
 * `set` or `slicesAsSets` is enabled.
 */
export function visitSequence(visitor: Visitor, elements: Iterable<unknown>, ctx?: VisitContext): void {
    if (ctx?.asSet === true || visitor.options.slicesAsSets) {
        visitSetSequence(visitor, elements);
        return;
    }

    for (const element of elements) {
        visitor.visit(element);
    }
}

/**
 * Hash a sequence whose element order does not matter.
 */
export function visitSetSequence(visitor: Visitor, elements: Iterable<unknown>): void {
    const hashes: Uint8Array[] = [];
    for (const element of elements) {
        hashes.push(visitor.subHash(element));
    }
    writeSorted(visitor, hashes);
}

// ============================================================================
// Internals
// ============================================================================

/** Byte-lexicographic order. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
    return Buffer.compare(a, b);
}

function writeSorted(visitor: Visitor, hashes: Uint8Array[]): void {
    hashes.sort(compareBytes);
    for (const h of hashes) {
        visitor.write(h);
    }
}
