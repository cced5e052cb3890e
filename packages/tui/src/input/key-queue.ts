import type { Key } from './keys.js';

/**
 * Something the editor loop can await one key at a time.
 * `next()` resolves to `null` once the input has ended.
 */
export interface KeySource {
    next(): Promise<Key | null>;
}

/**
 * FIFO between the input listener and the editor loop.
 *
 * Keys pushed while nobody is waiting are kept in order; after `close()`
 * queued keys are still delivered, then every `next()` resolves to `null`.
 */
export class KeyQueue implements KeySource {
    private readonly pending: Key[] = [];
    private readonly waiters: Array<(key: Key | null) => void> = [];
    private closed = false;

    push(key: Key): void {
        if (this.closed) {
            return;
        }
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter(key);
        } else {
            this.pending.push(key);
        }
    }

    next(): Promise<Key | null> {
        const key = this.pending.shift();
        if (key) {
            return Promise.resolve(key);
        }
        if (this.closed) {
            return Promise.resolve(null);
        }
        return new Promise((resolve) => {
            this.waiters.push(resolve);
        });
    }

    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        for (const waiter of this.waiters.splice(0)) {
            waiter(null);
        }
    }
}
