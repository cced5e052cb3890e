import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createKeypressParser, ESC_TIMEOUT } from './keypress-parser.js';
import type { Key } from './keys.js';

describe('createKeypressParser', () => {
    let keys: Key[];

    beforeEach(() => {
        vi.useFakeTimers();
        keys = [];
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    function parse(...chunks: string[]): Key[] {
        const parser = createKeypressParser((key) => keys.push(key));
        for (const chunk of chunks) {
            parser.push(chunk);
        }
        return keys;
    }

    it('should parse a lowercase letter', () => {
        expect(parse('a')).toEqual([
            { name: 'a', ctrl: false, meta: false, shift: false, sequence: 'a' },
        ]);
    });

    it('should flag shift on uppercase letters', () => {
        expect(parse('A')[0]).toMatchObject({ name: 'a', shift: true, sequence: 'A' });
    });

    it('should parse control characters as ctrl+letter', () => {
        expect(parse('\x11', '\x17', '\x04').map((key) => [key.name, key.ctrl])).toEqual([
            ['q', true],
            ['w', true],
            ['d', true],
        ]);
    });

    it('should name the editing keys', () => {
        expect(parse('\r\n\x7f\b\t').map((key) => key.name)).toEqual([
            'return',
            'enter',
            'backspace',
            'backspace',
            'tab',
        ]);
    });

    it('should name kitty-protocol editing keys', () => {
        expect(parse('\x1b[13u\x1b[57414u\x1b[127u\x1b[9u').map((key) => key.name)).toEqual([
            'return',
            'return',
            'backspace',
            'tab',
        ]);
    });

    it('should report unbound sequences whole under an undefined name', () => {
        expect(parse('\x1b[15~\x1b[H').map((key) => [key.name, key.sequence])).toEqual([
            ['undefined', '\x1b[15~'],
            ['undefined', '\x1b[H'],
        ]);
    });

    it('should parse arrow keys in both CSI and SS3 form', () => {
        expect(parse('\x1b[A\x1b[B\x1bOC\x1bOD').map((key) => key.name)).toEqual([
            'up',
            'down',
            'right',
            'left',
        ]);
    });

    it('should parse the delete key', () => {
        expect(parse('\x1b[3~')[0]).toMatchObject({ name: 'delete', sequence: '\x1b[3~' });
    });

    it('should read modifiers from the sequence', () => {
        expect(parse('\x1b[1;5A')[0]).toMatchObject({ name: 'up', ctrl: true, shift: false });
    });

    it('should join a sequence split across chunks', () => {
        expect(parse('\x1b[', 'B').map((key) => key.name)).toEqual(['down']);
    });

    it('should hold a lone escape until the timeout', () => {
        parse('\x1b');
        expect(keys).toEqual([]);

        vi.advanceTimersByTime(ESC_TIMEOUT);

        expect(keys).toEqual([
            {
                name: 'escape',
                ctrl: false,
                meta: true,
                shift: false,
                sequence: '\x1b',
            },
        ]);
    });

    it('should treat ESC followed by a letter as alt+letter', () => {
        expect(parse('\x1bx')[0]).toMatchObject({ name: 'x', meta: true, sequence: '\x1bx' });
    });

    it('should emit non-ASCII characters as one key each', () => {
        expect(parse('é😀').map((key) => [key.name, key.sequence])).toEqual([
            ['', 'é'],
            ['', '😀'],
        ]);
    });

    it('should emit each character of a chunk separately', () => {
        expect(parse('hi').map((key) => key.sequence)).toEqual(['h', 'i']);
    });

    it('should stop waiting for an escape after dispose()', () => {
        const parser = createKeypressParser((key) => keys.push(key));
        parser.push('\x1b');

        parser.dispose();
        vi.advanceTimersByTime(ESC_TIMEOUT * 2);

        expect(keys).toEqual([]);
    });
});
