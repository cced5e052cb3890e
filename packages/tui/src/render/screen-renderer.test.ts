import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { EditorWindow, TextBuffer } from '@linedit/core';
import {
    ScreenRenderer,
    composeScreen,
    displayLine,
    frameFromWindow,
    type ScreenFrame,
} from './screen-renderer.js';

const frame: ScreenFrame = {
    header: 'doc   help',
    lines: ['a\tb', 'x'.repeat(15)],
    cursor: { row: 2, col: 1 },
    columns: 10,
    rows: 3,
};

describe('displayLine', () => {
    it('should draw tabs as single spaces', () => {
        expect(displayLine('\ta\tb', 10)).toBe(' a b');
    });

    it('should cut the line at the screen width', () => {
        expect(displayLine('abcdef', 4)).toBe('abcd');
    });
});

describe('composeScreen', () => {
    it('should lay out header, separator and one row per viewport line', () => {
        expect(composeScreen(frame)).toEqual([
            'doc   help',
            '──────────',
            'a b',
            'xxxxxxxxxx',
            '',
        ]);
    });
});

describe('frameFromWindow', () => {
    it('should take the visible slice and translated cursor from the window', () => {
        const window = new EditorWindow(new TextBuffer(['one', 'two', 'three']), {
            rows: 2,
            cols: 20,
        });
        window.cursorDown();
        window.cursorDown();

        const result = frameFromWindow(window);

        expect(result.lines).toEqual(['two', 'three']);
        expect(result.cursor).toEqual({ row: 3, col: 0 });
        expect(result.columns).toBe(20);
        expect(result.rows).toBe(2);
        expect(result.header).toBe(window.header);
    });
});

describe('ScreenRenderer', () => {
    it('should draw every row and place the caret one-based', () => {
        const writes: string[] = [];
        const renderer = new ScreenRenderer((data) => writes.push(data), new Chalk({ level: 0 }));

        renderer.render(frame);

        expect(writes).toEqual([
            '\x1b[?25l' +
                '\x1b[1;1Hdoc   help\x1b[K' +
                '\x1b[2;1H──────────\x1b[K' +
                '\x1b[3;1Ha b\x1b[K' +
                '\x1b[4;1Hxxxxxxxxxx\x1b[K' +
                '\x1b[5;1H\x1b[K' +
                '\x1b[3;2H\x1b[?25h',
        ]);
    });

    it('should draw the header in inverse video', () => {
        const renderer = new ScreenRenderer(() => {}, new Chalk({ level: 1 }));

        const output = renderer.serialize(frame);

        expect(output).toContain('\x1b[7mdoc   help\x1b[27m');
    });
});
