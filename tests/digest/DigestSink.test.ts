import { describe, it, expect } from 'vitest';
import { NodeDigestSink } from '../../src/digest/DigestSink.js';
import { Fnv1a64 } from '../../src/digest/Fnv1a64.js';
import { hex } from '../helpers/bytes.js';

const text = (s: string): Uint8Array => new TextEncoder().encode(s);

describe('NodeDigestSink', () => {
    it('should produce the md5 of empty input', () => {
        const sink = new NodeDigestSink('md5');
        expect(hex(sink.digest())).toBe('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('should produce the md5 of "abc"', () => {
        const sink = new NodeDigestSink('md5');
        sink.update(text('abc'));
        expect(hex(sink.digest())).toBe('900150983cd24fb0d6963f7d28e17f72');
    });

    it('should produce the sha256 of empty input', () => {
        const sink = new NodeDigestSink('sha256');
        expect(hex(sink.digest())).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });

    it('should treat split updates as one stream', () => {
        const split = new NodeDigestSink('sha256');
        split.update(text('hel'));
        split.update(text('lo'));
        expect(hex(split.digest())).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
    });
});

describe('Fnv1a64', () => {
    it('should return the offset basis for empty input', () => {
        expect(hex(new Fnv1a64().digest())).toBe('cbf29ce484222325');
    });

    it('should hash "a"', () => {
        const sink = new Fnv1a64();
        sink.update(text('a'));
        expect(hex(sink.digest())).toBe('af63dc4c8601ec8c');
    });

    it('should hash "foobar"', () => {
        const sink = new Fnv1a64();
        sink.update(text('foobar'));
        expect(hex(sink.digest())).toBe('85944171f73967e8');
    });

    it('should produce 8 bytes', () => {
        expect(new Fnv1a64().digest()).toHaveLength(8);
    });

    it('should treat split updates as one stream', () => {
        const split = new Fnv1a64();
        split.update(text('foo'));
        split.update(text('bar'));
        expect(hex(split.digest())).toBe('85944171f73967e8');
    });
});
