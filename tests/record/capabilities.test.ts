import { describe, it, expect } from 'vitest';
import {
    isHashable, isIncludable, isIncludableMap, isStringer, invokeHook,
} from '../../src/record/capabilities.js';
import { HookError, UnsupportedValueError } from '../../src/core/errors.js';

class Tag {
    constructor(readonly label: string) {}

    toString(): string {
        return `#${this.label}`;
    }
}

class SpecialTag extends Tag {}

class CustomError extends Error {}

describe('capability checks', () => {
    it('should detect each hook independently', () => {
        const all = {
            hash: (): number => 1,
            hashInclude: (): boolean => true,
            hashIncludeMap: (): boolean => true,
        };
        expect(isHashable(all)).toBe(true);
        expect(isIncludable(all)).toBe(true);
        expect(isIncludableMap(all)).toBe(true);

        const none = { hash: 1 };
        expect(isHashable(none)).toBe(false);
        expect(isIncludable(none)).toBe(false);
        expect(isIncludableMap(none)).toBe(false);
    });

    it('should find hooks on the prototype', () => {
        class Filtered {
            hashInclude(): boolean {
                return true;
            }
        }
        expect(isIncludable(new Filtered())).toBe(true);
    });
});

describe('isStringer', () => {
    it('should accept classes with their own toString', () => {
        expect(isStringer(new Tag('a'))).toBe(true);
        expect(isStringer(new SpecialTag('a'))).toBe(true);
    });

    it('should accept objects carrying toString themselves', () => {
        expect(isStringer({ toString: () => 'x' })).toBe(true);
    });

    it('should reject built-in renderings', () => {
        expect(isStringer({})).toBe(false);
        expect(isStringer([])).toBe(false);
        expect(isStringer(new Date(0))).toBe(false);
        expect(isStringer(new Map())).toBe(false);
        expect(isStringer(new CustomError('x'))).toBe(false);
        expect(isStringer(Object.create(null))).toBe(false);
    });

    it('should reject primitives', () => {
        expect(isStringer('text')).toBe(false);
        expect(isStringer(5)).toBe(false);
        expect(isStringer(null)).toBe(false);
    });
});

describe('invokeHook', () => {
    it('should return the hook result', () => {
        expect(invokeHook('hash', 'T', () => 7)).toBe(7);
    });

    it('should wrap foreign errors', () => {
        expect(() => invokeHook('hashInclude', 'T', () => {
            throw new TypeError('nope');
        })).toThrow(HookError);
    });

    it('should wrap thrown non-errors', () => {
        expect(() => invokeHook('toString', 'T', () => {
            throw 'plain';
        })).toThrow('[canonhash] T.toString() failed: plain');
    });

    it('should pass hashing errors through unchanged', () => {
        const inner = new UnsupportedValueError('symbol');
        try {
            invokeHook('hash', 'T', () => {
                throw inner;
            });
            expect.unreachable();
        } catch (err) {
            expect(err).toBe(inner);
        }
    });
});
