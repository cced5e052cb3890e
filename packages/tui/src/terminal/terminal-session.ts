import { EditorLogComponent, type Logger } from '@linedit/core';
import { createKeypressParser } from '../input/keypress-parser.js';
import { KeyQueue, type KeySource } from '../input/key-queue.js';
import { ANSI } from './ansi.js';
import { TerminalError } from './errors.js';
import type { Terminal, TerminalSize } from './terminal.js';

export interface TerminalSessionOptions {
    logger: Logger;
    /** Draw on the alternate screen buffer (default: true) */
    alternateScreen?: boolean;
    /** How long a lone ESC waits for the rest of a sequence, in ms */
    escTimeout?: number;
}

/**
 * What the editor gets while it owns the terminal
 */
export interface TerminalSession {
    readonly keys: KeySource;
    readonly size: TerminalSize;
    write(data: string): void;
}

/**
 * Runs `body` with the terminal in raw mode and restores it on every exit
 * path, including a rejected `body`.
 *
 * @throws {EditorRuntimeError} RAW_MODE_FAILED when raw mode cannot be entered
 */
export async function withTerminalSession<T>(
    terminal: Terminal,
    options: TerminalSessionOptions,
    body: (session: TerminalSession) => Promise<T>
): Promise<T> {
    const logger = options.logger.createChild(EditorLogComponent.TERMINAL);
    const alternateScreen = options.alternateScreen ?? true;

    try {
        terminal.setRawMode(true);
    } catch (error) {
        throw TerminalError.rawModeFailed(error instanceof Error ? error.message : String(error));
    }

    const keys = new KeyQueue();
    const parser = createKeypressParser((key) => {
        logger.silly('Key received', { name: key.name, sequence: JSON.stringify(key.sequence) });
        keys.push(key);
    }, options.escTimeout);
    const offData = terminal.onData((data) => parser.push(data));
    const offEnd = terminal.onEnd(() => {
        logger.debug('Input stream ended');
        keys.close();
    });

    if (alternateScreen) {
        terminal.write(ANSI.enterAlternateScreen);
    }
    terminal.write(ANSI.clearScreen + ANSI.home);
    const size = terminal.size();
    logger.debug('Terminal session started', { ...size, alternateScreen });

    try {
        return await body({
            keys,
            size,
            write: (data) => terminal.write(data),
        });
    } finally {
        parser.dispose();
        offData();
        offEnd();
        keys.close();
        try {
            terminal.write(
                alternateScreen
                    ? ANSI.showCursor + ANSI.leaveAlternateScreen
                    : ANSI.clearScreen + ANSI.home + ANSI.showCursor
            );
            terminal.setRawMode(false);
            logger.debug('Terminal restored');
        } catch (error) {
            const restoreError = TerminalError.restoreFailed(
                error instanceof Error ? error.message : String(error)
            );
            logger.error(restoreError.message, restoreError.toJSON());
        }
    }
}
