/**
 * Console Transport
 *
 * One line per entry on stderr, optionally coloured by level. Stdout is left
 * to the editor, which draws the screen there.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

/** Anything with a string `write`, such as `process.stderr` */
export interface ConsoleSink {
    write(chunk: string): unknown;
}

export interface ConsoleTransportConfig {
    colorize?: boolean;
    /** Defaults to `process.stderr` */
    output?: ConsoleSink;
}

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.cyan,
    debug: chalk.gray,
    silly: chalk.dim,
};

export class ConsoleTransport implements LoggerTransport {
    private readonly colorize: boolean;
    private readonly output: ConsoleSink;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
        this.output = config.output ?? process.stderr;
    }

    /**
     * Writes `HH:MM:SS LEVEL [component] message`, followed by the context as
     * compact JSON when there is any.
     */
    write(entry: LogEntry): void {
        const time = entry.timestamp.slice(11, 19);
        const label = entry.level.toUpperCase().padEnd(5);

        let line = `${time} ${label} [${entry.component}] ${entry.message}`;
        if (this.colorize) {
            line = LEVEL_STYLES[entry.level](line);
        }
        if (entry.context && Object.keys(entry.context).length > 0) {
            line += ` ${JSON.stringify(entry.context)}`;
        }

        this.output.write(line + '\n');
    }
}
