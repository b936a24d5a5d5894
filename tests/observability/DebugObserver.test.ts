import { describe, it, expect, vi, afterEach } from 'vitest';
import { createDebugObserver, type DebugEvent } from '../../src/observability/DebugObserver.js';

describe('createDebugObserver', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return a custom handler as-is', () => {
        const handler = (_event: DebugEvent): void => undefined;
        expect(createDebugObserver(handler)).toBe(handler);
    });

    it('should log hash events to console.debug', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const observer = createDebugObserver();

        observer({ type: 'hash', format: 'md5', digestBytes: 16, durationMs: 1.5, timestamp: 0 });

        expect(spy).toHaveBeenCalledWith('[canonhash] hash      md5 ✓ 1.5ms (16 bytes)');
    });

    it('should log error events to console.debug', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const observer = createDebugObserver();

        observer({
            type: 'error',
            format: 'sha256',
            code: 'HOOK_FAILED',
            error: 'boom',
            durationMs: 2,
            timestamp: 0,
        });

        expect(spy).toHaveBeenCalledWith('[canonhash] error     sha256 ✗ HOOK_FAILED 2.0ms: boom');
    });
});
