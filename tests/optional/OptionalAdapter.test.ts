import { describe, it, expect } from 'vitest';
import { hashHex, tryHash } from '../../src/core/hash.js';
import { HashFormat } from '../../src/core/HashFormat.js';
import { HookError, UnsupportedValueError } from '../../src/core/errors.js';
import { resolveHashOptions } from '../../src/core/HashOptions.js';
import { encodeOptional } from '../../src/optional/OptionalAdapter.js';
import { isOptionalKind, isOptionalValue, OPTIONAL_KIND } from '../../src/optional/OptionalValue.js';
import { defineRecord } from '../../src/record/defineRecord.js';
import { some, none, FakeOptional } from '../helpers/FakeOptional.js';
import { md5, i64, u64, f64, hex } from '../helpers/bytes.js';

const MD5 = HashFormat.MD5;

class UnreadableOptional extends FakeOptional<number> {
    override orElse(): number {
        throw new Error('payload unreadable');
    }
}

class UnknowableOptional extends FakeOptional<number> {
    override isPresent(): boolean {
        throw new Error('presence unknown');
    }
}

class Profile {
    nickname: FakeOptional<string> = none('string');
    age: FakeOptional<number> = some('uint8', 30);
}
defineRecord(Profile, { nickname: true, age: true });

describe('OptionalValue', () => {
    it('should recognize the closed set of kinds', () => {
        expect(isOptionalKind('int32')).toBe(true);
        expect(isOptionalKind('float32')).toBe(true);
        expect(isOptionalKind('complex64')).toBe(false);
        expect(isOptionalKind('uintptr')).toBe(false);
    });

    it('should recognize branded optional values', () => {
        expect(isOptionalValue(some('int', 1))).toBe(true);
        expect(isOptionalValue({ isPresent: () => true, orElse: () => 1 })).toBe(false);
        expect(isOptionalValue({ [OPTIONAL_KIND]: 'decimal', isPresent: () => true, orElse: () => 1 })).toBe(false);
    });
});

describe('encodeOptional', () => {
    const plain = resolveHashOptions();

    it('should write the nil sentinel for an absent value', () => {
        const bytes = encodeOptional(none('int'), plain);
        expect(bytes && hex(bytes)).toBe('6e696c');
    });

    it('should write nothing for an absent value under ignoreZeroValue', () => {
        expect(encodeOptional(none('string'), resolveHashOptions({ ignoreZeroValue: true }))).toBeUndefined();
    });

    it('should prefer zeroNil over ignoreZeroValue for an absent value', () => {
        const bytes = encodeOptional(none('int'), resolveHashOptions({ zeroNil: true, ignoreZeroValue: true }));
        expect(bytes && hex(bytes)).toBe(hex(i64(0)));
    });

    it('should write nothing for a present zero under ignoreZeroValue', () => {
        expect(encodeOptional(some('bool', false), resolveHashOptions({ ignoreZeroValue: true }))).toBeUndefined();
        expect(encodeOptional(some('string', ''), resolveHashOptions({ ignoreZeroValue: true }))).toBeUndefined();
    });
});

describe('optional values in digests', () => {
    it('should hash absent values as "nil"', () => {
        expect(hashHex(none('int32'), MD5)).toBe(md5('nil'));
    });

    it('should hash absent values as the kind zero under zeroNil', () => {
        expect(hashHex(none('int32'), MD5, { zeroNil: true })).toBe(md5(i64(0)));
        expect(hashHex(none('uint16'), MD5, { zeroNil: true })).toBe(md5(u64(0)));
        expect(hashHex(none('bool'), MD5, { zeroNil: true })).toBe(md5(Uint8Array.of(0)));
        expect(hashHex(none('string'), MD5, { zeroNil: true })).toBe(md5('string'));
        expect(hashHex(none('error'), MD5, { zeroNil: true })).toBe(md5('error'));
    });

    it('should prefix text payloads with their kind', () => {
        expect(hashHex(some('string', 'abc'), MD5)).toBe(md5('stringabc'));
        expect(hashHex(some('error', new Error('boom')), MD5)).toBe(md5('errorboom'));
    });

    it('should never collide a present "nil" string with an absent value', () => {
        expect(hashHex(some('string', 'nil'), MD5)).not.toBe(hashHex(none('string'), MD5));
    });

    it('should widen integers to 64 bits', () => {
        expect(hashHex(some('int8', -3), MD5)).toBe(md5(i64(-3)));
        expect(hashHex(some('uint8', 255), MD5)).toBe(md5(u64(255)));
        expect(hashHex(some('uint64', 2n ** 64n - 1n), MD5)).toBe(md5(u64(2n ** 64n - 1n)));
    });

    it('should reject integers outside the declared width', () => {
        expect(() => hashHex(some('int8', 200), MD5)).toThrow(UnsupportedValueError);
        expect(() => hashHex(some('uint32', -1), MD5)).toThrow('[canonhash] Unknown kind to hash: number (-1 does not fit optional uint32)');
        expect(() => hashHex(some('int', 1.5), MD5)).toThrow(UnsupportedValueError);
    });

    it('should widen float32 payloads through single precision', () => {
        expect(hashHex(some('float32', 0.1), MD5)).toBe(md5(f64(Math.fround(0.1))));
        expect(hashHex(some('float64', 0.1), MD5)).toBe(md5(f64(0.1)));
    });

    it('should reject payloads of the wrong kind', () => {
        expect(() => hashHex(some('bool', 'yes'), MD5)).toThrow(UnsupportedValueError);
        expect(() => hashHex(some('string', 5), MD5)).toThrow(UnsupportedValueError);
    });

    it('should wrap a failing orElse', () => {
        expect(() => hashHex(new UnreadableOptional('int', 1), MD5))
            .toThrow('[canonhash] UnreadableOptional.orElse() failed: payload unreadable');
    });

    it('should wrap a failing isPresent', () => {
        expect(() => hashHex(new UnknowableOptional('int', 1), MD5)).toThrow(HookError);
    });

    it('should wrap a failing isPresent during zero checks', () => {
        class Holder {
            value: FakeOptional<number> = new UnknowableOptional('int', 1);
        }
        defineRecord(Holder, { value: true });

        const result = tryHash(new Holder(), MD5, { ignoreZeroValue: true });
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.message).toBe('[canonhash] UnknowableOptional.isPresent() failed: presence unknown');
        }
    });

    it('should unbox optional record fields', () => {
        expect(hashHex(new Profile(), MD5)).toBe(md5('Profile', 'nickname', 'nil', 'age', u64(30)));
    });

    it('should skip absent optional fields under ignoreZeroValue', () => {
        expect(hashHex(new Profile(), MD5, { ignoreZeroValue: true })).toBe(md5('Profile', 'age', u64(30)));
    });
});
