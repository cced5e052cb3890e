/**
 * Keypress parser
 *
 * Turns raw terminal input into key events. Escape sequences are buffered
 * until complete; a lone ESC is released after ESC_TIMEOUT.
 */

import { ESC, type Key, type KeypressHandler } from './keys.js';

export const ESC_TIMEOUT = 50;

// Escape sequences the editor binds. Anything else is reported with name
// 'undefined' and its full sequence.
const KEY_NAMES: Record<string, string> = {
    '[A': 'up',
    '[B': 'down',
    '[C': 'right',
    '[D': 'left',
    OA: 'up',
    OB: 'down',
    OC: 'right',
    OD: 'left',
    '[3~': 'delete',
    '[9u': 'tab',
    '[13u': 'return',
    '[27u': 'escape',
    '[127u': 'backspace',
    '[57414u': 'return', // Numpad Enter
};

const kUTF16SurrogateThreshold = 0x10000;
function charLengthAt(str: string, i: number): number {
    if (str.length <= i) return 1;
    const code = str.codePointAt(i);
    return code !== undefined && code >= kUTF16SurrogateThreshold ? 2 : 1;
}

export interface KeypressParser {
    /** Feeds one chunk of terminal input */
    push(data: string): void;
    /** Cancels the pending ESC timeout */
    dispose(): void;
}

/**
 * Creates a parser that turns raw terminal input into keypress events
 */
export function createKeypressParser(
    keypressHandler: KeypressHandler,
    escTimeout: number = ESC_TIMEOUT
): KeypressParser {
    const parser = emitKeys(keypressHandler);
    parser.next(); // Prime the generator

    let timeoutId: NodeJS.Timeout | undefined;
    return {
        push(data: string) {
            clearTimeout(timeoutId);
            for (const char of data) {
                parser.next(char);
            }
            if (data.length !== 0) {
                timeoutId = setTimeout(() => parser.next(''), escTimeout);
            }
        },
        dispose() {
            clearTimeout(timeoutId);
            timeoutId = undefined;
        },
    };
}

/**
 * Generator that translates raw keypress characters into key events.
 * Buffers escape sequences until complete or timeout; an empty string
 * signals the timeout.
 */
function* emitKeys(keypressHandler: KeypressHandler): Generator<void, void, string> {
    while (true) {
        let ch = yield;
        if (ch === '') {
            continue;
        }
        let sequence = ch;
        let escaped = false;

        let name: string | undefined = undefined;
        let ctrl = false;
        let meta = false;
        let shift = false;

        if (ch === ESC) {
            escaped = true;
            ch = yield;
            sequence += ch;

            if (ch === ESC) {
                ch = yield;
                sequence += ch;
            }
        }

        if (escaped && (ch === 'O' || ch === '[')) {
            // ANSI escape sequence
            let code = ch;
            let modifier = 0;

            if (ch === 'O') {
                // ESC O letter or ESC O modifier letter
                ch = yield;
                sequence += ch;

                if (ch >= '0' && ch <= '9') {
                    modifier = parseInt(ch, 10) - 1;
                    ch = yield;
                    sequence += ch;
                }

                code += ch;
            } else {
                // ESC [ sequences
                ch = yield;
                sequence += ch;

                if (ch === '[') {
                    code += ch;
                    ch = yield;
                    sequence += ch;
                }

                const cmdStart = sequence.length - 1;

                // Collect digits
                while (ch >= '0' && ch <= '9') {
                    ch = yield;
                    sequence += ch;
                }

                // Handle modifiers
                if (ch === ';') {
                    while (ch === ';') {
                        ch = yield;
                        sequence += ch;

                        while (ch >= '0' && ch <= '9') {
                            ch = yield;
                            sequence += ch;
                        }
                    }
                }

                const cmd = sequence.slice(cmdStart);
                let match: RegExpExecArray | null;

                if ((match = /^(\d+)(?:;(\d+))?(?:;(\d+))?([~^$u])$/.exec(cmd))) {
                    if (match[1] === '27' && match[3] && match[4] === '~') {
                        // modifyOtherKeys format
                        code += match[3] + 'u';
                        modifier = parseInt(match[2] ?? '1', 10) - 1;
                    } else {
                        code += (match[1] ?? '') + (match[4] ?? '');
                        modifier = parseInt(match[2] ?? '1', 10) - 1;
                    }
                } else if ((match = /^(\d+)?(?:;(\d+))?([A-Za-z])$/.exec(cmd))) {
                    code += match[3] ?? '';
                    modifier = parseInt(match[2] ?? match[1] ?? '1', 10) - 1;
                } else {
                    code += cmd;
                }
            }

            // xterm modifier encoding: shift=1, meta/alt=2, ctrl=4
            ctrl = !!(modifier & 4);
            meta = !!(modifier & 2);
            shift = !!(modifier & 1);

            name = KEY_NAMES[code] ?? 'undefined';
        } else if (ch === '\r') {
            name = 'return';
            meta = escaped;
        } else if (ch === '\n') {
            name = 'enter';
            meta = escaped;
        } else if (ch === '\t') {
            name = 'tab';
            meta = escaped;
        } else if (ch === '\b' || ch === '\x7f') {
            name = 'backspace';
            meta = escaped;
        } else if (ch === ESC) {
            name = 'escape';
            meta = escaped;
        } else if (ch === ' ') {
            name = 'space';
            meta = escaped;
        } else if (!escaped && ch <= '\x1a') {
            // ctrl+letter
            name = String.fromCharCode(ch.charCodeAt(0) + 'a'.charCodeAt(0) - 1);
            ctrl = true;
        } else if (/^[0-9A-Za-z]$/.exec(ch) !== null) {
            name = ch.toLowerCase();
            shift = /^[A-Z]$/.exec(ch) !== null;
            meta = escaped;
        } else if (sequence === `${ESC}${ESC}`) {
            name = 'escape';
            meta = true;

            // Emit first escape key
            keypressHandler({
                name: 'escape',
                ctrl,
                meta,
                shift,
                sequence: ESC,
            });
        } else if (escaped) {
            name = ch.length ? undefined : 'escape';
            meta = true;
        }

        if (
            (sequence.length !== 0 && (name !== undefined || escaped)) ||
            charLengthAt(sequence, 0) === sequence.length
        ) {
            const key: Key = {
                name: name ?? '',
                ctrl,
                meta,
                shift,
                sequence,
            };
            keypressHandler(key);
        }
    }
}
