const CSI = '\u001B[';

export const ANSI = {
    CSI,
    clearLine: `${CSI}2K`,
    clearToLineEnd: `${CSI}K`,
    clearScreen: `${CSI}2J`,
    hideCursor: `${CSI}?25l`,
    showCursor: `${CSI}?25h`,
    home: `${CSI}H`,
    enterAlternateScreen: `${CSI}?1049h`,
    leaveAlternateScreen: `${CSI}?1049l`,
    /** One-based row and column */
    moveTo(row1: number, col1: number) {
        return `${CSI}${row1};${col1}H`;
    },
} as const;
