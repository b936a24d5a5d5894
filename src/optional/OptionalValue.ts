/**
 * OptionalValue: the Optional-Type Adapter Interface
 *
 * Optional-value libraries keep their payload private, so a walker
 * cannot traverse them field by field. A library (or a thin adapter
 * around it) exposes this interface instead, and the walker unboxes
 * the payload according to the declared {@link OptionalKind}.
 *
 * @example
 * ```typescript
 * import { OPTIONAL_KIND, type OptionalValue } from 'canonhash';
 *
 * class OptionalInt32 implements OptionalValue<number> {
 *     readonly [OPTIONAL_KIND] = 'int32' as const;
 *     constructor(private readonly value?: number) {}
 *     isPresent() { return this.value !== undefined; }
 *     orElse(fallback: number) { return this.value ?? fallback; }
 * }
 * ```
 *
 * @module
 */

/** Brand carrying the declared kind of an optional value. */
export const OPTIONAL_KIND: unique symbol = Symbol.for('canonhash.optional.kind');

/** The closed set of optional kinds the walker knows how to unbox. */
export const OPTIONAL_KINDS = [
    'string', 'error', 'bool',
    'int', 'int8', 'int16', 'int32', 'int64',
    'uint', 'uint8', 'uint16', 'uint32', 'uint64',
    'float32', 'float64',
] as const;

export type OptionalKind = (typeof OPTIONAL_KINDS)[number];

export interface OptionalValue<T = unknown> {
    readonly [OPTIONAL_KIND]: OptionalKind;
    isPresent(): boolean;
    orElse(fallback: T): T;
}

const KIND_SET: ReadonlySet<unknown> = new Set<unknown>(OPTIONAL_KINDS);

export function isOptionalKind(value: unknown): value is OptionalKind {
    return KIND_SET.has(value);
}

export function isOptionalValue(value: object): value is OptionalValue {
    return OPTIONAL_KIND in value
        && isOptionalKind(value[OPTIONAL_KIND])
        && 'isPresent' in value && typeof value.isPresent === 'function'
        && 'orElse' in value && typeof value.orElse === 'function';
}
