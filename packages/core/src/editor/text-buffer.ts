import type { EditorWindow } from './editor-window.js';
import type { LineSource } from './types.js';

/**
 * Ordered lines of the open document plus its dirty flag.
 *
 * Always holds at least one line; an empty document is `[""]`.
 * Edit operations read the cursor position from the window they are given.
 */
export class TextBuffer implements LineSource {
    private readonly _lines: string[];
    private _dirty = false;

    constructor(lines: readonly string[] = []) {
        this._lines = lines.length > 0 ? [...lines] : [''];
    }

    get lines(): readonly string[] {
        return this._lines;
    }

    get lineCount(): number {
        return this._lines.length;
    }

    get dirty(): boolean {
        return this._dirty;
    }

    line(row: number): string {
        return this._lines[row] ?? '';
    }

    lineLength(row: number): number {
        return this.line(row).length;
    }

    slice(start: number, end: number): string[] {
        return this._lines.slice(start, end);
    }

    markClean(): void {
        this._dirty = false;
    }

    /**
     * Inserts `text` at the cursor and advances the cursor one position.
     *
     * Rejected without any change when the resulting line would reach
     * `viewportCols - 1` characters.
     *
     * @returns whether the text was inserted
     */
    insert(window: EditorWindow, text: string): boolean {
        const { row, col } = window.cursor;
        const current = this.line(row);
        const next = current.slice(0, col) + text + current.slice(col);

        if (next.length >= window.viewportCols - 1) {
            return false;
        }

        this._lines.splice(row, 1, next);
        this._dirty = true;
        window.cursorRight();
        return true;
    }

    /**
     * Deletes the character under the cursor, or joins the next line when the
     * cursor sits at the end of a line. No-op at the end of the document.
     *
     * @returns whether the buffer changed
     */
    delete(window: EditorWindow): boolean {
        const lastRow = this._lines.length - 1;
        const row = Math.min(window.cursor.row, lastRow);
        const col = window.cursor.col;

        const atDocumentEnd = row === lastRow && col >= this.lineLength(lastRow);
        if (atDocumentEnd) {
            return false;
        }

        const current = this.line(row);
        if (col < current.length) {
            this._lines[row] = current.slice(0, col) + current.slice(col + 1);
        } else {
            this._lines.splice(row, 2, current + this.line(row + 1));
        }
        this._dirty = true;
        return true;
    }

    /**
     * Breaks the cursor's line in two at the cursor column. The cursor is left
     * where it was; moving it onto the new line is up to the caller.
     */
    split(window: EditorWindow): void {
        const { row, col } = window.cursor;
        const current = this.line(row);
        this._lines.splice(row, 1, current.slice(0, col), current.slice(col));
        this._dirty = true;
    }
}
