const LINE_TERMINATOR = /\r\n|\r|\n/;

/**
 * Splits file content into lines on CR, LF or CRLF.
 *
 * A single trailing terminator does not produce an extra empty line, so
 * `"a\n"` and `"a"` both yield `["a"]`. Which terminator was used is not kept.
 */
export function splitLines(content: string): string[] {
    if (content.length === 0) {
        return [];
    }
    const lines = content.split(LINE_TERMINATOR);
    if (lines.length > 1 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

/**
 * Joins lines with `\n`, without a trailing newline.
 */
export function joinLines(lines: readonly string[]): string {
    return lines.join('\n');
}
