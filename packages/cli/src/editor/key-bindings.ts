import type { UnknownKeyPolicy } from '@linedit/core';
import type { Key } from '@linedit/tui';

export type MoveDirection = 'up' | 'down' | 'left' | 'right';

/**
 * What a keypress asks the editor to do
 */
export type EditorCommand =
    | { type: 'quit' }
    | { type: 'save' }
    | { type: 'newline' }
    | { type: 'move'; direction: MoveDirection }
    | { type: 'delete' }
    | { type: 'backspace' }
    | { type: 'insert'; text: string }
    | { type: 'ignore' };

const ARROWS: Record<string, MoveDirection> = {
    up: 'up',
    down: 'down',
    left: 'left',
    right: 'right',
};

function isPrintableAscii(sequence: string): boolean {
    if (sequence.length !== 1) return false;
    const code = sequence.charCodeAt(0);
    return code >= 0x20 && code <= 0x7e;
}

/**
 * Code point of a key that produced exactly one character, else null
 */
function singleCodePoint(sequence: string): number | null {
    const chars = Array.from(sequence);
    if (chars.length !== 1) return null;
    return sequence.codePointAt(0) ?? null;
}

/**
 * Maps a key to an editor command.
 *
 * Printable ASCII and tab are inserted as typed. Any other single-character
 * key falls to `policy`: `insert-code` inserts its decimal code point,
 * `ignore` drops it. Unbound multi-character sequences are always ignored.
 */
export function resolveCommand(key: Key, policy: UnknownKeyPolicy): EditorCommand {
    if (key.ctrl && !key.meta) {
        if (key.name === 'q') return { type: 'quit' };
        if (key.name === 'w') return { type: 'save' };
        if (key.name === 'd') return { type: 'delete' };
    }

    if (!key.meta) {
        if (key.name === 'return' || key.name === 'enter') return { type: 'newline' };
        if (key.name === 'backspace') return { type: 'backspace' };
        if (key.name === 'delete' && !key.ctrl && !key.shift) return { type: 'delete' };
        if (key.name === 'tab' && !key.ctrl && !key.shift) return { type: 'insert', text: '\t' };

        const direction = ARROWS[key.name];
        if (direction && !key.ctrl && !key.shift) {
            return { type: 'move', direction };
        }
    }

    if (isPrintableAscii(key.sequence)) {
        return { type: 'insert', text: key.sequence };
    }

    const code = singleCodePoint(key.sequence);
    if (code !== null && policy === 'insert-code') {
        return { type: 'insert', text: String(code) };
    }
    return { type: 'ignore' };
}
