/**
 * Read-only view of a line sequence, enough for cursor movement.
 */
export interface LineSource {
    readonly lineCount: number;
    lineLength(row: number): number;
}

/**
 * Fixed text area of the terminal below the header, in cells.
 */
export interface Viewport {
    rows: number;
    cols: number;
}

/** Zero-based screen cell */
export interface ScreenPosition {
    row: number;
    col: number;
}

/** Title line plus separator line drawn above the document */
export const HEADER_HEIGHT = 2;

export const HELP_TEXT = '^Q quit  ^W save';
