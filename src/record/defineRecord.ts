/**
 * defineRecord(): Per-Type Field Registration
 *
 * Records are class instances. A class is registered once with the
 * ordered list of fields that take part in its digest, each with an
 * optional declared value type and a set of tags. Only listed fields
 * are visible to the walker; everything else on the instance (extra
 * properties, `hidden` fields, `#private` fields) never reaches the digest.
 *
 * @example
 * ```typescript
 * import { defineRecord } from 'canonhash';
 *
 * class Address { Street = ''; Zip = 0; }
 * defineRecord(Address, { Street: true, Zip: 'uint' });
 *
 * class Person {
 *     Name = '';
 *     UUID = '';
 *     Tags: string[] = [];
 *     Home: Address | null = null;
 * }
 * defineRecord(Person, {
 *     Name: true,
 *     UUID: 'ignore',
 *     Tags: 'set',
 *     Home: { type: Address },
 * });
 * ```
 *
 * Classes that are never registered still hash: their field list is
 * derived from the instance's own enumerable keys at traversal time,
 * minus `_`-prefixed private state.
 *
 * @module
 */
import { DEFAULT_TAG_NAME } from '../core/HashOptions.js';
import { invokeHook } from './capabilities.js';

// ============================================================================
// Field Metadata
// ============================================================================

/**
 * Behavior switches attachable to a field.
 *
 * - `'ignore'` / `'-'`: the field never affects the digest
 * - `'set'`: an array field is hashed order-independently
 * - `'string'`: the value is hashed through its own `toString()`
 */
export type FieldTag = 'ignore' | '-' | 'set' | 'string';

/** A class whose zero-argument constructor yields its zero value. */
export type RecordClass<T extends object = object> = new () => T;

/** Scalar and collection value types a field may declare. */
export type ScalarType = 'int' | 'uint' | 'float' | 'bool' | 'string' | 'time' | 'sequence' | 'map';

/**
 * Declared value type of a field. Drives the numeric family used to
 * encode numbers and the zero value substituted under `zeroNil`.
 */
export type ValueType = ScalarType | RecordClass;

/** Full field declaration. */
export interface FieldSpec {
    /** Declared value type */
    readonly type?: ValueType | undefined;
    /** Tags keyed by tag name, e.g. `{ hash: 'ignore', audit: 'set' }` */
    readonly tags?: Readonly<Record<string, FieldTag>> | undefined;
    /** Present on the instance but not externally visible */
    readonly hidden?: boolean | undefined;
}

/**
 * Field declaration shorthands:
 * - `true`: visible, untagged, untyped
 * - a `FieldTag`: tagged under the default tag name (`hash`)
 * - a `ScalarType` or record class: typed, untagged
 * - a {@link FieldSpec}
 */
export type FieldDeclaration = true | FieldTag | ValueType | FieldSpec;

/** Field declarations keyed by property name, in declaration order. */
export type RecordFields<T> = {
    readonly [K in Extract<keyof T, string>]?: FieldDeclaration;
};

/** A resolved field of a record schema. */
export interface FieldDescriptor {
    readonly name: string;
    readonly visible: boolean;
    readonly type?: ValueType | undefined;
    readonly tags: Readonly<Record<string, FieldTag>>;
}

/** Ordered, resolved field list of a record type. */
export interface RecordSchema {
    readonly typeName: string;
    readonly fields: readonly FieldDescriptor[];
}

export interface DefineRecordOptions {
    /** Name written into the digest. Default: the class name. */
    readonly typeName?: string | undefined;
}

// ============================================================================
// Registry
// ============================================================================

// Keyed by prototype so instances resolve through their prototype chain.
const _schemas = new WeakMap<object, RecordSchema>();

// Naming convention for private state on unregistered classes.
const PRIVATE_PREFIX = '_';

const FIELD_TAGS: ReadonlySet<string> = new Set<FieldTag>(['ignore', '-', 'set', 'string']);
const SCALAR_TYPES: ReadonlySet<string> = new Set<ScalarType>(['int', 'uint', 'float', 'bool', 'string', 'time', 'sequence', 'map']);

/**
 * Register the ordered field list of a record class.
 *
 * Registering the same class again replaces its schema. Subclasses
 * inherit the schema of their nearest registered ancestor until they
 * are registered themselves.
 *
 * @returns The resolved schema
 */
export function defineRecord<T extends object>(
    target: abstract new (...args: never[]) => T,
    fields: RecordFields<T>,
    options: DefineRecordOptions = {},
): RecordSchema {
    const resolved: FieldDescriptor[] = [];
    for (const [name, declaration] of Object.entries<FieldDeclaration | undefined>(fields)) {
        if (declaration === undefined) continue;
        resolved.push(resolveField(name, declaration));
    }

    const schema: RecordSchema = Object.freeze({
        typeName: options.typeName ?? target.name,
        fields: Object.freeze(resolved),
    });
    _schemas.set(target.prototype, schema);
    return schema;
}

/**
 * Look up the registered schema of an instance, walking its prototype chain.
 */
export function getRecordSchema(record: object): RecordSchema | undefined {
    for (let proto: object | null = Object.getPrototypeOf(record); proto !== null; proto = Object.getPrototypeOf(proto)) {
        const schema = _schemas.get(proto);
        if (schema) return schema;
    }
    return undefined;
}

/**
 * Schema of a record: the registered one, or one derived from the
 * instance's own enumerable string keys.
 */
export function resolveRecordSchema(record: object): RecordSchema {
    return getRecordSchema(record) ?? deriveRecordSchema(record);
}

/**
 * Derive a schema for an unregistered class instance. Keys starting with
 * `_` are private state and are left out; TypeScript `private` members
 * without the prefix are indistinguishable at run time, so register the
 * class to hide them.
 */
export function deriveRecordSchema(record: object): RecordSchema {
    return {
        typeName: constructorName(record),
        fields: Object.keys(record)
            .filter(name => !name.startsWith(PRIVATE_PREFIX))
            .map(name => ({ name, visible: true, tags: {} })),
    };
}

/**
 * Read a field through the normal property lookup (own, prototype, getters).
 * A throwing getter surfaces as a `HookError` naming `typeName.name`.
 */
export function readField(record: object, name: string, typeName: string): unknown {
    return invokeHook('get', `${typeName}.${name}`, () => Reflect.get(record, name));
}

// ============================================================================
// Internals
// ============================================================================

function resolveField(name: string, declaration: FieldDeclaration): FieldDescriptor {
    if (declaration === true) {
        return { name, visible: true, tags: {} };
    }
    if (typeof declaration === 'function') {
        return { name, visible: true, type: declaration, tags: {} };
    }
    if (typeof declaration === 'string') {
        if (FIELD_TAGS.has(declaration)) {
            return { name, visible: true, tags: { [DEFAULT_TAG_NAME]: toFieldTag(declaration) } };
        }
        if (SCALAR_TYPES.has(declaration)) {
            return { name, visible: true, type: toScalarType(declaration), tags: {} };
        }
        throw new TypeError(`[canonhash] Unknown field declaration for "${name}": ${declaration}`);
    }
    return {
        name,
        visible: declaration.hidden !== true,
        type: declaration.type,
        tags: Object.freeze({ ...(declaration.tags ?? {}) }),
    };
}

function toFieldTag(value: string): FieldTag {
    switch (value) {
        case 'ignore': case '-': case 'set': case 'string':
            return value;
        default:
            throw new TypeError(`[canonhash] Unknown field tag: ${value}`);
    }
}

function toScalarType(value: string): ScalarType {
    switch (value) {
        case 'int': case 'uint': case 'float': case 'bool':
        case 'string': case 'time': case 'sequence': case 'map':
            return value;
        default:
            throw new TypeError(`[canonhash] Unknown value type: ${value}`);
    }
}

function constructorName(record: object): string {
    const ctor: unknown = Reflect.get(record, 'constructor');
    return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'Object';
}
