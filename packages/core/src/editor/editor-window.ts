import { Cursor } from './cursor.js';
import { formatHeader } from './header.js';
import type { TextBuffer } from './text-buffer.js';
import { HEADER_HEIGHT, HELP_TEXT, type ScreenPosition, type Viewport } from './types.js';

/**
 * Visible region of the document.
 *
 * Owns the cursor, references the buffer, and keeps the cursor's row inside
 * `[scrollRow, scrollRow + viewportRows)` after every movement by scrolling a
 * single row at a time. Horizontal scrolling is not supported; `scrollCol`
 * stays 0.
 */
export class EditorWindow {
    readonly cursor: Cursor;
    readonly viewportRows: number;
    readonly viewportCols: number;
    readonly scrollCol = 0;

    private _scrollRow = 0;
    private _title = '';
    private _header: string;

    constructor(
        readonly buffer: TextBuffer,
        viewport: Viewport,
        title = '',
        cursor: Cursor = new Cursor()
    ) {
        this.viewportRows = Math.max(1, viewport.rows);
        this.viewportCols = Math.max(1, viewport.cols);
        this.cursor = cursor;
        this._title = title;
        this._header = formatHeader(title, HELP_TEXT, this.viewportCols);
    }

    get scrollRow(): number {
        return this._scrollRow;
    }

    get title(): string {
        return this._title;
    }

    /** Title line, exactly `viewportCols` wide */
    get header(): string {
        return this._header;
    }

    setTitle(title: string): void {
        if (title === this._title) {
            return;
        }
        this._title = title;
        this._header = formatHeader(title, HELP_TEXT, this.viewportCols);
    }

    cursorUp(): void {
        this.cursor.moveUp(this.buffer);
        this.scrollToCursor();
    }

    cursorDown(): void {
        this.cursor.moveDown(this.buffer);
        this.scrollToCursor();
    }

    cursorLeft(): void {
        this.cursor.moveLeft(this.buffer);
        this.scrollToCursor();
    }

    /**
     * Moves right only while the cursor is short of the last usable column.
     */
    cursorRight(): void {
        if (this.cursor.col >= this.viewportCols - 1) {
            return;
        }
        this.cursor.moveRight(this.buffer);
        this.scrollToCursor();
    }

    /**
     * Screen cell of the cursor, counting the header rows.
     */
    translate(): ScreenPosition {
        return {
            row: this.cursor.row - this._scrollRow + HEADER_HEIGHT,
            col: this.cursor.col - this.scrollCol,
        };
    }

    visibleLines(): string[] {
        return this.buffer.slice(this._scrollRow, this._scrollRow + this.viewportRows);
    }

    // Cursor moves are single-row, so a single-row scroll restores containment.
    private scrollToCursor(): void {
        if (this.cursor.row < this._scrollRow) {
            this._scrollRow -= 1;
        } else if (this.cursor.row > this._scrollRow + this.viewportRows - 1) {
            this._scrollRow += 1;
        }
    }
}
