import type { LineSource } from './types.js';

/**
 * Logical editing position within a buffer.
 *
 * `colHint` remembers the last explicitly requested column. Vertical moves
 * derive `col` from it (clamped to the new line) without changing it, so the
 * cursor returns to a far-right column after passing through short lines.
 * Explicit placement goes through {@link Cursor.setColumn}, which updates both.
 */
export class Cursor {
    private _row: number;
    private _col: number;
    private _colHint: number;

    constructor(row = 0, col = 0, colHint = col) {
        this._row = row;
        this._col = col;
        this._colHint = colHint;
    }

    get row(): number {
        return this._row;
    }

    get col(): number {
        return this._col;
    }

    get colHint(): number {
        return this._colHint;
    }

    setColumn(value: number): void {
        this._col = value;
        this._colHint = value;
    }

    /**
     * Re-derives `col` from `colHint` for the current row. Leaves `colHint` alone.
     */
    clampColumnToHint(buffer: LineSource): void {
        this._col = Math.min(this._colHint, buffer.lineLength(this._row));
    }

    placeAt(row: number, col: number): void {
        this._row = row;
        this.setColumn(col);
    }

    moveUp(buffer: LineSource): void {
        if (this._row > 0) {
            this._row -= 1;
            this.clampColumnToHint(buffer);
        }
    }

    moveDown(buffer: LineSource): void {
        if (this._row < buffer.lineCount - 1) {
            this._row += 1;
            this.clampColumnToHint(buffer);
        }
    }

    /**
     * At column 0 wraps to the end of the previous line.
     */
    moveLeft(buffer: LineSource): void {
        if (this._col > 0) {
            this.setColumn(this._col - 1);
        } else if (this._row > 0) {
            this._row -= 1;
            this.setColumn(buffer.lineLength(this._row));
        }
    }

    /**
     * At the end of a line wraps to the start of the next one.
     */
    moveRight(buffer: LineSource): void {
        if (this._col < buffer.lineLength(this._row)) {
            this.setColumn(this._col + 1);
        } else if (this._row < buffer.lineCount - 1) {
            this._row += 1;
            this.setColumn(0);
        }
    }
}
