/**
 * Lays out the title bar: `title` on the left, `help` on the right, padded
 * with spaces to exactly `width` characters.
 *
 * When both don't fit with at least one space between them, the help text is
 * dropped and the title truncated to the width.
 */
export function formatHeader(title: string, help: string, width: number): string {
    if (width <= 0) {
        return '';
    }
    const gap = width - title.length - help.length;
    if (help.length > 0 && gap >= 1) {
        return title + ' '.repeat(gap) + help;
    }
    return title.slice(0, width).padEnd(width, ' ');
}
