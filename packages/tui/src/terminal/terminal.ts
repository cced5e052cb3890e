export interface TerminalSize {
    columns: number;
    rows: number;
}

export type Unsubscribe = () => void;

/**
 * The slice of a TTY the editor needs. Tests supply an in-memory one.
 */
export interface Terminal {
    size(): TerminalSize;
    write(data: string): void;
    onData(handler: (data: string) => void): Unsubscribe;
    /** Fires once the input stream has ended */
    onEnd(handler: () => void): Unsubscribe;
    setRawMode(enabled: boolean): void;
}

export interface ProcessTerminalOptions {
    input?: NodeJS.ReadStream;
    output?: NodeJS.WriteStream;
    /** Used when the output stream reports no size (not a TTY) */
    fallbackSize?: TerminalSize;
}

export class ProcessTerminal implements Terminal {
    private readonly input: NodeJS.ReadStream;
    private readonly output: NodeJS.WriteStream;
    private readonly fallbackSize: TerminalSize;

    constructor(options?: ProcessTerminalOptions) {
        this.input = options?.input ?? process.stdin;
        this.output = options?.output ?? process.stdout;
        this.fallbackSize = options?.fallbackSize ?? { columns: 80, rows: 24 };
    }

    size(): TerminalSize {
        return {
            columns: this.output.columns || this.fallbackSize.columns,
            rows: this.output.rows || this.fallbackSize.rows,
        };
    }

    write(data: string): void {
        this.output.write(data);
    }

    onData(handler: (data: string) => void): Unsubscribe {
        this.input.setEncoding('utf8');
        const onData = (chunk: string | Buffer) =>
            handler(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
        this.input.on('data', onData);
        return () => this.input.off('data', onData);
    }

    onEnd(handler: () => void): Unsubscribe {
        const onEnd = () => handler();
        this.input.on('end', onEnd);
        return () => this.input.off('end', onEnd);
    }

    setRawMode(enabled: boolean): void {
        if (enabled) {
            this.input.resume();
        } else {
            this.input.pause();
        }
        if (!this.input.isTTY) return;
        this.input.setRawMode(enabled);
    }
}
