/**
 * canonhash: Root Barrel Export
 *
 * Deterministic digests of in-memory value graphs.
 *
 * Architecture:
 *   src/
 *   ├── core/          ← hash(), formats, options, errors, Result
 *   ├── digest/        ← Digest accumulators (node:crypto, FNV-1a)
 *   ├── walker/        ← Normalizer, encoders, canonicalizer, record walker
 *   ├── record/        ← defineRecord() registration, capability checks
 *   ├── optional/      ← Optional-value interface and adapter table
 *   └── observability/ ← Debug observer
 */

// ── Core ─────────────────────────────────────────────────
/** @category Core */
export { hash, tryHash, hashHex } from './core/hash.js';
/** @category Core */
export { HashFormat, isHashFormat, digestLength, formatName } from './core/HashFormat.js';
/** @category Core */
export { HashOptionsSchema, DEFAULT_TAG_NAME, resolveHashOptions } from './core/HashOptions.js';
/** @category Core */
export type { HashOptions, ResolvedHashOptions } from './core/HashOptions.js';
/** @category Core */
export { succeed, fail } from './core/result.js';
/** @category Core */
export type { Result, Success, Failure } from './core/result.js';

// ── Errors ───────────────────────────────────────────────
/** @category Errors */
export {
    HashError,
    InvalidFormatError,
    InvalidOptionsError,
    NotStringerError,
    UnsupportedValueError,
    HookError,
    TimestampEncodingError,
} from './core/errors.js';
/** @category Errors */
export type { HashErrorCode, HookName } from './core/errors.js';

// ── Records ──────────────────────────────────────────────
/** @category Records */
export { defineRecord, getRecordSchema, resolveRecordSchema } from './record/defineRecord.js';
/** @category Records */
export type {
    FieldTag, FieldSpec, FieldDeclaration, FieldDescriptor,
    RecordFields, RecordSchema, RecordClass, ScalarType, ValueType,
    DefineRecordOptions,
} from './record/defineRecord.js';
/** @category Records */
export { isHashable, isIncludable, isIncludableMap, isStringer } from './record/capabilities.js';
/** @category Records */
export type { Hashable, Includable, IncludableMap, Stringer } from './record/capabilities.js';

// ── Optional Values ──────────────────────────────────────
/** @category Optional Values */
export { OPTIONAL_KIND, OPTIONAL_KINDS, isOptionalKind, isOptionalValue } from './optional/OptionalValue.js';
/** @category Optional Values */
export type { OptionalKind, OptionalValue } from './optional/OptionalValue.js';

// ── Digest ───────────────────────────────────────────────
/** @category Digest */
export { NodeDigestSink, Fnv1a64 } from './digest/index.js';
/** @category Digest */
export type { DigestSink, NodeDigestAlgorithm } from './digest/index.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export { createDebugObserver } from './observability/DebugObserver.js';
/** @category Observability */
export type {
    DebugEvent, DebugObserverFn, HashEvent, HashErrorEvent,
} from './observability/DebugObserver.js';
