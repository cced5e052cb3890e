import type { Logger } from '@linedit/core';

/**
 * Exit codes reported for each handled signal (128 + signal number)
 */
export const SIGNAL_EXIT_CODES = {
    SIGHUP: 129,
    SIGTERM: 143,
} as const;

export type ShutdownSignal = keyof typeof SIGNAL_EXIT_CODES;

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGTERM', 'SIGHUP'];

/**
 * Routes SIGTERM and SIGHUP to `onShutdown` once, so the editor can end its
 * loop and release the terminal instead of dying with it in raw mode.
 *
 * @returns a function that removes the handlers
 */
export function registerGracefulShutdown(
    onShutdown: (signal: ShutdownSignal, exitCode: number) => void,
    logger: Logger
): () => void {
    let isShuttingDown = false;

    const handlers = SHUTDOWN_SIGNALS.map((signal) => {
        const handler = () => {
            if (isShuttingDown) return;
            isShuttingDown = true;

            logger.info(`Received ${signal}, closing without saving`);
            onShutdown(signal, SIGNAL_EXIT_CODES[signal]);
        };
        process.on(signal, handler);
        return { signal, handler };
    });

    return () => {
        for (const { signal, handler } of handlers) {
            process.off(signal, handler);
        }
    };
}
