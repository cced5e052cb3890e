import chalk, { type ChalkInstance } from 'chalk';
import type { EditorWindow, ScreenPosition } from '@linedit/core';
import { ANSI } from '../terminal/ansi.js';

export const SEPARATOR_CHAR = '─';

/**
 * Everything needed to draw one full screen
 */
export interface ScreenFrame {
    header: string;
    /** Document lines inside the viewport, top first */
    lines: readonly string[];
    /** Caret cell, already translated to screen coordinates */
    cursor: ScreenPosition;
    columns: number;
    /** Text rows below the header */
    rows: number;
}

export function frameFromWindow(window: EditorWindow): ScreenFrame {
    return {
        header: window.header,
        lines: window.visibleLines(),
        cursor: window.translate(),
        columns: window.viewportCols,
        rows: window.viewportRows,
    };
}

/**
 * Tabs take one cell; anything past the right edge is cut off.
 */
export function displayLine(line: string, columns: number): string {
    return line.replace(/\t/g, ' ').slice(0, columns);
}

/**
 * Plain-text rows of the screen: header, separator, then one row per
 * viewport line (empty past the end of the document).
 */
export function composeScreen(frame: ScreenFrame): string[] {
    const rows = [frame.header, SEPARATOR_CHAR.repeat(frame.columns)];
    for (let i = 0; i < frame.rows; i++) {
        rows.push(displayLine(frame.lines[i] ?? '', frame.columns));
    }
    return rows;
}

/**
 * Redraws the whole screen on every frame and leaves the caret at the
 * cursor's cell.
 */
export class ScreenRenderer {
    constructor(
        private readonly write: (data: string) => void,
        private readonly style: ChalkInstance = chalk
    ) {}

    serialize(frame: ScreenFrame): string {
        const rows = composeScreen(frame);
        let output = ANSI.hideCursor;
        rows.forEach((row, index) => {
            const text = index === 0 ? this.style.inverse(row) : row;
            output += ANSI.moveTo(index + 1, 1) + text + ANSI.clearToLineEnd;
        });
        output += ANSI.moveTo(frame.cursor.row + 1, frame.cursor.col + 1) + ANSI.showCursor;
        return output;
    }

    render(frame: ScreenFrame): void {
        this.write(this.serialize(frame));
    }
}
