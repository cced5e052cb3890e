import type { Terminal, TerminalSize, Unsubscribe } from '../terminal/terminal.js';

/**
 * In-memory terminal for tests: records output and lets the test feed input.
 */
export class FakeTerminal implements Terminal {
    readonly writes: string[] = [];
    rawMode = false;
    rawModeError: Error | null = null;

    private dataHandlers = new Set<(data: string) => void>();
    private endHandlers = new Set<() => void>();
    /** Input typed before anyone listened, replayed to the first listener */
    private pendingInput: string[] = [];
    private ended = false;

    constructor(private readonly terminalSize: TerminalSize = { columns: 40, rows: 6 }) {}

    size(): TerminalSize {
        return { ...this.terminalSize };
    }

    write(data: string): void {
        this.writes.push(data);
    }

    onData(handler: (data: string) => void): Unsubscribe {
        this.dataHandlers.add(handler);
        for (const data of this.pendingInput.splice(0)) {
            handler(data);
        }
        return () => this.dataHandlers.delete(handler);
    }

    onEnd(handler: () => void): Unsubscribe {
        this.endHandlers.add(handler);
        if (this.ended) {
            handler();
        }
        return () => this.endHandlers.delete(handler);
    }

    setRawMode(enabled: boolean): void {
        if (enabled && this.rawModeError) {
            throw this.rawModeError;
        }
        this.rawMode = enabled;
    }

    /** Delivers input as if typed */
    type(data: string): void {
        if (this.dataHandlers.size === 0) {
            this.pendingInput.push(data);
            return;
        }
        for (const handler of [...this.dataHandlers]) {
            handler(data);
        }
    }

    end(): void {
        this.ended = true;
        for (const handler of [...this.endHandlers]) {
            handler();
        }
    }

    get listenerCount(): number {
        return this.dataHandlers.size + this.endHandlers.size;
    }

    get output(): string {
        return this.writes.join('');
    }
}
