/**
 * Traversal seams shared by the walker components.
 *
 * @module
 * @internal
 */
import { type ResolvedHashOptions } from '../core/HashOptions.js';
import { type ValueType } from '../record/defineRecord.js';

/**
 * Per-call context, created fresh for every recursive visit of a
 * record field and dropped when that visit returns.
 */
export interface VisitContext {
    /** The field is tagged `set` */
    readonly asSet: boolean;
    /** Record holding the field, for `hashIncludeMap` */
    readonly parent?: object | undefined;
    /** Declared name of the field */
    readonly field?: string | undefined;
    /** Declared value type of the field */
    readonly type?: ValueType | undefined;
}

/**
 * What the walker components see of the walker that drives them.
 */
export interface Visitor {
    readonly options: ResolvedHashOptions;

    /** Visit a nested value, writing into the current digest. */
    visit(value: unknown, ctx?: VisitContext): void;

    /** Write raw bytes into the current digest. */
    write(bytes: Uint8Array): void;

    /** Write UTF-8 text into the current digest. */
    writeText(text: string): void;

    /** Digest a value with an independent traversal (same format and options). */
    subHash(value: unknown): Uint8Array;
}
