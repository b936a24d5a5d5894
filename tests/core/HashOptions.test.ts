import { describe, it, expect } from 'vitest';
import { resolveHashOptions, DEFAULT_TAG_NAME, type HashOptions } from '../../src/core/HashOptions.js';
import { InvalidOptionsError } from '../../src/core/errors.js';

describe('resolveHashOptions', () => {
    it('should apply defaults when options are omitted', () => {
        expect(resolveHashOptions()).toEqual({
            tagName: 'hash',
            zeroNil: false,
            ignoreZeroValue: false,
            slicesAsSets: false,
            useStringer: false,
            debug: undefined,
        });
    });

    it('should treat an empty object like omitted options', () => {
        expect(resolveHashOptions({})).toEqual(resolveHashOptions());
    });

    it('should select the default tag name for an empty string', () => {
        expect(resolveHashOptions({ tagName: '' }).tagName).toBe(DEFAULT_TAG_NAME);
    });

    it('should keep a custom tag name', () => {
        expect(resolveHashOptions({ tagName: 'audit' }).tagName).toBe('audit');
    });

    it('should keep flags and the debug observer', () => {
        const debug = (): void => undefined;
        const resolved = resolveHashOptions({ zeroNil: true, slicesAsSets: true, debug });
        expect(resolved.zeroNil).toBe(true);
        expect(resolved.slicesAsSets).toBe(true);
        expect(resolved.ignoreZeroValue).toBe(false);
        expect(resolved.debug).toBe(debug);
    });

    it('should freeze the resolved options', () => {
        expect(Object.isFrozen(resolveHashOptions({ zeroNil: true }))).toBe(true);
    });

    it('should reject unknown keys', () => {
        const options = { bogus: true } as unknown as HashOptions;
        expect(() => resolveHashOptions(options)).toThrow(InvalidOptionsError);
    });

    it('should reject a debug observer that is not a function', () => {
        const options = { debug: 'console' } as unknown as HashOptions;
        try {
            resolveHashOptions(options);
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(InvalidOptionsError);
            if (err instanceof InvalidOptionsError) {
                expect(err.issues).toEqual(['debug: Expected a function']);
            }
        }
    });

    it('should reject a non-string tag name', () => {
        const options = { tagName: 7 } as unknown as HashOptions;
        expect(() => resolveHashOptions(options)).toThrow('[canonhash] Invalid hash options: tagName: Expected string, received number');
    });
});
