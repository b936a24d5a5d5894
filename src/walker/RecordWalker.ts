/**
 * RecordWalker: Field-by-Field Record Traversal
 *
 * Pipeline per record:
 *
 *   hash() implemented?  ──yes──► write integer as decimal text, stop
 *          │ no
 *   optional value?      ──yes──► unbox through the adapter table, stop
 *          │ no
 *   write type name
 *          │
 *   for each field (declaration order):
 *     invisible → skip
 *     tag ignore / '-' → skip
 *     zero + ignoreZeroValue → skip
 *     tag string / useStringer → toString() (tag string requires it)
 *     hashInclude() rejects → skip
 *     write field name, visit value (asSet when tagged set)
 *
 * @module
 * @internal
 */
import { HookError, NotStringerError } from '../core/errors.js';
import { invokeHook, isHashable, isIncludable, isStringer } from '../record/capabilities.js';
import { readField, resolveRecordSchema } from '../record/defineRecord.js';
import { isOptionalValue } from '../optional/OptionalValue.js';
import { encodeOptional } from '../optional/OptionalAdapter.js';
import { isZeroValue } from './ValueNormalizer.js';
import { type Visitor } from './VisitContext.js';

export function visitRecord(visitor: Visitor, record: object): void {
    const { options } = visitor;
    const schema = resolveRecordSchema(record);
    const { typeName } = schema;

    if (isHashable(record)) {
        const hashable = record;
        const code: unknown = invokeHook('hash', typeName, () => hashable.hash());
        if (typeof code === 'bigint') {
            visitor.writeText(code.toString());
            return;
        }
        if (typeof code !== 'number') {
            throw new HookError('hash', typeName, code, `expected a number or bigint, got ${typeof code}`);
        }
        if (!Number.isInteger(code)) {
            throw new HookError('hash', typeName, code, `expected an integer, got ${code}`);
        }
        visitor.writeText(BigInt(code).toString());
        return;
    }

    if (isOptionalValue(record)) {
        const bytes = encodeOptional(record, options);
        if (bytes !== undefined) visitor.write(bytes);
        return;
    }

    const include = isIncludable(record) ? record : undefined;

    visitor.writeText(typeName);

    for (const field of schema.fields) {
        if (!field.visible) continue;

        const tag = field.tags[options.tagName];
        if (tag === 'ignore' || tag === '-') continue;

        let value = readField(record, field.name, typeName);

        if (options.ignoreZeroValue && isZeroValue(value)) continue;

        if (tag === 'string' || options.useStringer) {
            if (isStringer(value)) {
                const stringer = value;
                value = invokeHook('toString', typeName, () => stringer.toString());
            } else if (tag === 'string') {
                throw new NotStringerError(typeName, field.name);
            }
        }

        if (include) {
            const current = value;
            const included = invokeHook('hashInclude', typeName, () => include.hashInclude(field.name, current));
            if (!included) continue;
        }

        visitor.writeText(field.name);
        visitor.visit(value, {
            asSet: tag === 'set',
            parent: record,
            field: field.name,
            type: field.type,
        });
    }
}
