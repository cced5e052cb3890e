export const ESC = '\u001B';

/**
 * A parsed keypress.
 *
 * `sequence` is the raw text the key produced; `name` is empty for plain
 * characters other than letters, digits and space.
 */
export interface Key {
    name: string;
    ctrl: boolean;
    meta: boolean;
    shift: boolean;
    sequence: string;
}

export type KeypressHandler = (key: Key) => void;
