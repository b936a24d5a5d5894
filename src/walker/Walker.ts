/**
 * Walker: Recursive Visitor and Kind Dispatch
 *
 * Owns one digest accumulator for one traversal. Every value is first
 * normalized, then dispatched on its concrete kind:
 *
 *   boolean / number / bigint / string ──► PrimitiveEncoder
 *   Date                               ──► timestamp encoding
 *   Array / typed array                ──► ordered (or set) sequence
 *   Set                                ──► set sequence
 *   Map / plain object                 ──► keyed collection
 *   anything else that is an object    ──► RecordWalker
 *
 * Nested values recurse through {@link Walker.visit}; keyed collection
 * members and set elements are digested by fresh walkers.
 *
 * @module
 * @internal
 */
import { UnsupportedValueError } from '../core/errors.js';
import { createDigestSink, type HashFormat } from '../core/HashFormat.js';
import { type ResolvedHashOptions } from '../core/HashOptions.js';
import { type DigestSink } from '../digest/DigestSink.js';
import {
    encodeBigInt, encodeBool, encodeNumber, encodeText, encodeTimestamp,
} from './PrimitiveEncoder.js';
import { isPlainObject, normalizeValue } from './ValueNormalizer.js';
import { visitKeyedCollection, visitSequence, visitSetSequence } from './CollectionCanonicalizer.js';
import { visitRecord } from './RecordWalker.js';
import { type Visitor, type VisitContext } from './VisitContext.js';

export class Walker implements Visitor {
    readonly format: HashFormat;
    readonly options: ResolvedHashOptions;
    private readonly _sink: DigestSink;

    constructor(format: HashFormat, options: ResolvedHashOptions) {
        this.format = format;
        this.options = options;
        this._sink = createDigestSink(format);
    }

    // ── Visitor ──────────────────────────────────────────

    visit(raw: unknown, ctx?: VisitContext): void {
        const { value, type } = normalizeValue(raw, ctx?.type, this.options);

        if (typeof value === 'boolean') {
            this.write(encodeBool(value));
            return;
        }
        if (typeof value === 'number') {
            this.write(encodeNumber(value, type));
            return;
        }
        if (typeof value === 'bigint') {
            this.write(encodeBigInt(value, type));
            return;
        }
        if (typeof value === 'string') {
            this.writeText(value);
            return;
        }
        if (typeof value !== 'object' || value === null) {
            throw new UnsupportedValueError(value === null ? 'null' : typeof value);
        }

        if (value instanceof Date) {
            this.write(encodeTimestamp(value));
            return;
        }

        if (Array.isArray(value)) {
            visitSequence(this, value, ctx);
            return;
        }

        if (value instanceof DataView) {
            throw new UnsupportedValueError('DataView');
        }

        if (isTypedArray(value)) {
            visitSequence(this, typedArrayElements(value), ctx);
            return;
        }

        if (value instanceof Set) {
            visitSetSequence(this, value);
            return;
        }

        if (value instanceof Map) {
            visitKeyedCollection(this, value.entries(), ctx);
            return;
        }

        const unsupported = unsupportedObjectKind(value);
        if (unsupported !== undefined) {
            throw new UnsupportedValueError(unsupported);
        }

        if (isPlainObject(value)) {
            visitKeyedCollection(this, Object.entries(value), ctx);
            return;
        }

        visitRecord(this, value);
    }

    write(bytes: Uint8Array): void {
        this._sink.update(bytes);
    }

    writeText(text: string): void {
        this.write(encodeText(text));
    }

    subHash(value: unknown): Uint8Array {
        return hashValue(value, this.format, this.options);
    }

    // ── Finalization ─────────────────────────────────────

    digest(): Uint8Array {
        return this._sink.digest();
    }
}

/**
 * Run one complete traversal with a fresh walker and return its digest.
 * Performs no format or options validation.
 */
export function hashValue(value: unknown, format: HashFormat, options: ResolvedHashOptions): Uint8Array {
    const walker = new Walker(format, options);
    walker.visit(value);
    return walker.digest();
}

// ============================================================================
// Internals
// ============================================================================

// Objects with no meaningful content to hash.
const UNSUPPORTED_OBJECTS: ReadonlyArray<readonly [string, abstract new (...args: never[]) => object]> = [
    ['Promise', Promise],
    ['WeakMap', WeakMap],
    ['WeakSet', WeakSet],
    ['WeakRef', WeakRef],
];

function unsupportedObjectKind(value: object): string | undefined {
    for (const [kind, ctor] of UNSUPPORTED_OBJECTS) {
        if (value instanceof ctor) return kind;
    }
    return undefined;
}

type TypedArray =
    | Int8Array | Uint8Array | Uint8ClampedArray
    | Int16Array | Uint16Array | Int32Array | Uint32Array
    | Float32Array | Float64Array
    | BigInt64Array | BigUint64Array;

function isTypedArray(value: object): value is TypedArray {
    return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function typedArrayElements(view: TypedArray): unknown[] {
    const elements: unknown[] = [];
    for (const element of view) {
        elements.push(element);
    }
    return elements;
}
