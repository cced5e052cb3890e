import { describe, it, expect, vi, afterEach } from 'vitest';
import { createMockLogger } from '@linedit/core/test-utils';
import { registerGracefulShutdown } from './graceful-shutdown.js';

describe('registerGracefulShutdown', () => {
    let unregister: (() => void) | undefined;

    afterEach(() => {
        unregister?.();
        unregister = undefined;
    });

    it('should report SIGTERM with exit code 143', () => {
        const onShutdown = vi.fn();
        unregister = registerGracefulShutdown(onShutdown, createMockLogger());

        process.emit('SIGTERM', 'SIGTERM');

        expect(onShutdown).toHaveBeenCalledWith('SIGTERM', 143);
    });

    it('should report SIGHUP with exit code 129', () => {
        const onShutdown = vi.fn();
        unregister = registerGracefulShutdown(onShutdown, createMockLogger());

        process.emit('SIGHUP', 'SIGHUP');

        expect(onShutdown).toHaveBeenCalledWith('SIGHUP', 129);
    });

    it('should only shut down once', () => {
        const onShutdown = vi.fn();
        unregister = registerGracefulShutdown(onShutdown, createMockLogger());

        process.emit('SIGTERM', 'SIGTERM');
        process.emit('SIGHUP', 'SIGHUP');

        expect(onShutdown).toHaveBeenCalledTimes(1);
    });

    it('should remove its handlers', () => {
        const before = process.listenerCount('SIGTERM');
        const stop = registerGracefulShutdown(vi.fn(), createMockLogger());
        expect(process.listenerCount('SIGTERM')).toBe(before + 1);

        stop();

        expect(process.listenerCount('SIGTERM')).toBe(before);
    });
});
