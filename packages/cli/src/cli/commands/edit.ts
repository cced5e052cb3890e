import {
    createLogger,
    DocumentError,
    DocumentStore,
    EditorLogComponent,
    HEADER_HEIGHT,
    TextBuffer,
    unwrapOr,
    type DocumentStorage,
    type Logger,
    type Viewport,
} from '@linedit/core';
import {
    ProcessTerminal,
    ScreenRenderer,
    withTerminalSession,
    type Terminal,
    type TerminalSize,
} from '@linedit/tui';
import type { ChalkInstance } from 'chalk';
import { loadEditorConfig } from '../../config/editor-config.js';
import { EditorSession } from '../../editor/editor-session.js';
import { registerGracefulShutdown } from '../../utils/graceful-shutdown.js';
import type { CliOptions } from '../utils/options.js';

/**
 * Collaborators the command normally builds itself; tests pass fakes.
 */
export interface EditCommandDeps {
    terminal?: Terminal;
    storage?: (logger: Logger) => DocumentStorage;
    env?: NodeJS.ProcessEnv;
    style?: ChalkInstance;
}

export function viewportFor(size: TerminalSize): Viewport {
    return {
        rows: Math.max(1, size.rows - HEADER_HEIGHT),
        cols: size.columns,
    };
}

/**
 * Opens `file` in the full-screen editor and resolves to the exit code.
 *
 * A missing file argument prints a usage line and returns 1 before anything
 * else is set up. Config errors propagate to the caller.
 */
export async function handleEditCommand(
    file: string | undefined,
    options: CliOptions,
    deps: EditCommandDeps = {}
): Promise<number> {
    if (!file) {
        console.log('no file specified');
        return 1;
    }

    const config = await loadEditorConfig(options, deps.env ?? process.env);
    const logger = createLogger(config.logger);
    logger
        .createChild(EditorLogComponent.CONFIG)
        .debug('Configuration resolved', { keys: config.keys, terminal: config.terminal });

    try {
        const storage = deps.storage ? deps.storage(logger) : new DocumentStore(logger);
        const loaded = await storage.load(file);
        if (!loaded.ok) {
            // Opening a file that cannot be read starts an empty document
            const loadError = DocumentError.fromLoadFailure(loaded.error);
            logger.debug(loadError.message, { code: loadError.code });
        }
        const buffer = new TextBuffer(unwrapOr(loaded, []));

        const terminal =
            deps.terminal ??
            new ProcessTerminal({
                fallbackSize: {
                    columns: config.terminal.fallbackColumns,
                    rows: config.terminal.fallbackRows,
                },
            });

        return await withTerminalSession(
            terminal,
            { logger, alternateScreen: config.terminal.alternateScreen },
            async (session) => {
                const editor = new EditorSession({
                    filePath: file,
                    buffer,
                    viewport: viewportFor(session.size),
                    storage,
                    keys: session.keys,
                    renderer: new ScreenRenderer(session.write, deps.style),
                    logger,
                    unknownKeyPolicy: config.keys.unknownKeyPolicy,
                });
                const unregister = registerGracefulShutdown(
                    (_signal, exitCode) => editor.terminate(exitCode),
                    logger
                );
                try {
                    return await editor.run();
                } finally {
                    unregister();
                }
            }
        );
    } catch (error) {
        logger.trackException(error instanceof Error ? error : new Error(String(error)));
        throw error;
    } finally {
        await logger.destroy();
    }
}
