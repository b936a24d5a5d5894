/**
 * ValueNormalizer: Indirection Stripping and the Zero Policy
 *
 * Unwraps boxed primitives down to a concrete value and resolves
 * absent values (`null` / `undefined`):
 *
 * - with `zeroNil` and a declared field type, an absent value becomes
 *   the zero value of that type;
 * - otherwise it becomes the signed integer `0`.
 *
 * Also answers "is this the zero value?" for `ignoreZeroValue`.
 *
 * @module
 * @internal
 */
import { type ResolvedHashOptions } from '../core/HashOptions.js';
import { resolveRecordSchema, readField, type ValueType } from '../record/defineRecord.js';
import { isOptionalValue } from '../optional/OptionalValue.js';
import { isOptionalPresent } from '../optional/OptionalAdapter.js';
import { ZERO_TIME_MS } from './PrimitiveEncoder.js';

/** A value ready for kind dispatch, with the type it is encoded under. */
export interface NormalizedValue {
    readonly value: unknown;
    readonly type?: ValueType | undefined;
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Strip boxes and resolve absence.
 *
 * @param value - The raw value
 * @param type - Declared type of the field holding it, if any
 */
export function normalizeValue(
    value: unknown,
    type: ValueType | undefined,
    options: ResolvedHashOptions,
): NormalizedValue {
    let current = value;
    while (isBoxedPrimitive(current)) {
        current = current.valueOf();
    }

    if (current === null || current === undefined) {
        if (options.zeroNil && type !== undefined) {
            return { value: zeroValueOf(type), type };
        }
        return { value: 0, type: 'int' };
    }

    return { value: current, type };
}

/**
 * Zero value of a declared type. Record classes are instantiated with
 * their zero-argument constructor.
 */
export function zeroValueOf(type: ValueType): unknown {
    switch (type) {
        case 'int':
        case 'uint':
        case 'float':
            return 0;
        case 'bool':
            return false;
        case 'string':
            return '';
        case 'time':
            return new Date(ZERO_TIME_MS);
        case 'sequence':
            return [];
        case 'map':
            return new Map<unknown, unknown>();
        default:
            return new type();
    }
}

// ============================================================================
// Zero Detection
// ============================================================================

/**
 * Whether a field value is the zero value of its kind.
 *
 * `-0` and `NaN` are not zero. Collections are zero when empty; a
 * record is zero when all of its visible fields are zero.
 */
export function isZeroValue(value: unknown): boolean {
    let current = value;
    while (isBoxedPrimitive(current)) {
        current = current.valueOf();
    }

    if (current === null || current === undefined) return true;
    if (typeof current === 'boolean') return !current;
    if (typeof current === 'number') return Object.is(current, 0);
    if (typeof current === 'bigint') return current === 0n;
    if (typeof current === 'string') return current === '';
    if (typeof current !== 'object') return false;

    if (current instanceof Date) return current.getTime() === ZERO_TIME_MS;
    if (Array.isArray(current)) return current.length === 0;
    if (ArrayBuffer.isView(current)) return current.byteLength === 0;
    if (current instanceof Map || current instanceof Set) return current.size === 0;
    if (isOptionalValue(current)) return !isOptionalPresent(current);
    if (isPlainObject(current)) return Object.keys(current).length === 0;

    const record = current;
    const { typeName, fields } = resolveRecordSchema(record);
    return fields
        .filter(field => field.visible)
        .every(field => isZeroValue(readField(record, field.name, typeName)));
}

// ============================================================================
// Helpers
// ============================================================================

type BoxedPrimitive = number | string | boolean | bigint;

/** `new Number(1)`, `new String('a')`, `Object(1n)` and friends. */
export function isBoxedPrimitive(value: unknown): value is { valueOf(): BoxedPrimitive } {
    return value instanceof Number
        || value instanceof String
        || value instanceof Boolean
        || value instanceof BigInt;
}

/** Objects whose prototype is `Object.prototype` or `null`. */
export function isPlainObject(value: object): boolean {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
