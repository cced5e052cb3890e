import {
    EditorLogComponent,
    EditorWindow,
    ErrorScope,
    toEditorRuntimeError,
    type DocumentStorage,
    type Logger,
    type TextBuffer,
    type UnknownKeyPolicy,
    type Viewport,
} from '@linedit/core';
import { frameFromWindow, type Key, type KeySource, type ScreenFrame } from '@linedit/tui';
import { resolveCommand, type EditorCommand, type MoveDirection } from './key-bindings.js';

export interface FrameRenderer {
    render(frame: ScreenFrame): void;
}

export interface EditorSessionOptions {
    /** Path the document is saved to; also shown as its name */
    filePath: string;
    buffer: TextBuffer;
    viewport: Viewport;
    storage: DocumentStorage;
    keys: KeySource;
    renderer: FrameRenderer;
    logger: Logger;
    unknownKeyPolicy?: UnknownKeyPolicy;
}

/**
 * The editor loop: draw, wait for one key, apply it, repeat until quit.
 *
 * Resolves to the process exit code: 0 for Ctrl+Q or end of input, or the
 * code passed to {@link EditorSession.terminate}.
 */
export class EditorSession {
    readonly window: EditorWindow;

    private readonly filePath: string;
    private readonly buffer: TextBuffer;
    private readonly storage: DocumentStorage;
    private readonly keys: KeySource;
    private readonly renderer: FrameRenderer;
    private readonly logger: Logger;
    private readonly unknownKeyPolicy: UnknownKeyPolicy;

    private exitCode: number | null = null;
    /** Shown for one frame instead of the usual title */
    private transientTitle: string | null = null;
    private readonly terminated: Promise<null>;
    private resolveTerminated: () => void = () => {};

    constructor(options: EditorSessionOptions) {
        this.filePath = options.filePath;
        this.buffer = options.buffer;
        this.storage = options.storage;
        this.keys = options.keys;
        this.renderer = options.renderer;
        this.logger = options.logger.createChild(EditorLogComponent.EDITOR);
        this.unknownKeyPolicy = options.unknownKeyPolicy ?? 'insert-code';
        this.window = new EditorWindow(this.buffer, options.viewport, this.filePath);
        this.terminated = new Promise<null>((resolve) => {
            this.resolveTerminated = () => resolve(null);
        });
    }

    get isRunning(): boolean {
        return this.exitCode === null;
    }

    async run(): Promise<number> {
        this.logger.debug('Editor started', {
            file: this.filePath,
            lines: this.buffer.lineCount,
            rows: this.window.viewportRows,
            cols: this.window.viewportCols,
        });

        while (this.exitCode === null) {
            this.refreshTitle();
            this.render();

            const key = await Promise.race([this.keys.next(), this.terminated]);
            if (this.exitCode !== null) {
                break;
            }
            if (key === null) {
                this.logger.info('Input ended, closing without saving', {
                    dirty: this.buffer.dirty,
                });
                this.terminate(0);
                break;
            }
            await this.handleKey(key);
        }

        this.logger.debug('Editor stopped', { exitCode: this.exitCode });
        return this.exitCode ?? 0;
    }

    /**
     * Ends the loop without saving. Takes effect even while waiting for a key.
     */
    terminate(exitCode: number): void {
        if (this.exitCode !== null) {
            return;
        }
        this.exitCode = exitCode;
        this.resolveTerminated();
    }

    async handleKey(key: Key): Promise<void> {
        const command = resolveCommand(key, this.unknownKeyPolicy);
        this.logger.silly('Command', { command: command.type, key: key.name });
        await this.execute(command);
    }

    private async execute(command: EditorCommand): Promise<void> {
        switch (command.type) {
            case 'quit':
                this.terminate(0);
                return;
            case 'save':
                await this.save();
                return;
            case 'newline':
                this.buffer.split(this.window);
                this.window.cursorRight();
                return;
            case 'move':
                this.move(command.direction);
                return;
            case 'delete':
                this.buffer.delete(this.window);
                return;
            case 'backspace': {
                const { row, col } = this.window.cursor;
                if (row > 0 || col > 0) {
                    this.window.cursorLeft();
                    this.buffer.delete(this.window);
                }
                return;
            }
            case 'insert':
                if (!this.buffer.insert(this.window, command.text)) {
                    this.logger.debug('Insert rejected at line width limit', {
                        row: this.window.cursor.row,
                        limit: this.window.viewportCols - 1,
                    });
                }
                return;
            case 'ignore':
                return;
        }
    }

    private move(direction: MoveDirection): void {
        switch (direction) {
            case 'up':
                this.window.cursorUp();
                break;
            case 'down':
                this.window.cursorDown();
                break;
            case 'left':
                this.window.cursorLeft();
                break;
            case 'right':
                this.window.cursorRight();
                break;
        }
    }

    /**
     * Writes the buffer. A failure is logged and reported in the title for
     * one frame; the buffer stays dirty.
     */
    private async save(): Promise<void> {
        this.window.setTitle(`Writing ${this.filePath}...`);
        this.render();

        try {
            await this.storage.save(this.filePath, this.buffer.lines);
            this.buffer.markClean();
        } catch (error) {
            const saveError = toEditorRuntimeError(error, ErrorScope.DOCUMENT);
            this.logger.error(saveError.message, saveError.toJSON());
            const reason = saveError.context?.reason;
            this.transientTitle = `${this.filePath} (Save failed: ${
                typeof reason === 'string' ? reason : saveError.message
            })`;
        }
    }

    private refreshTitle(): void {
        if (this.transientTitle !== null) {
            this.window.setTitle(this.transientTitle);
            this.transientTitle = null;
            return;
        }
        this.window.setTitle(
            this.buffer.dirty ? `*${this.filePath} (Unsaved changes)` : this.filePath
        );
    }

    private render(): void {
        this.renderer.render(frameFromWindow(this.window));
    }
}
