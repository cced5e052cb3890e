// Input
export { ESC } from './input/keys.js';
export type { Key, KeypressHandler } from './input/keys.js';
export { createKeypressParser, ESC_TIMEOUT } from './input/keypress-parser.js';
export type { KeypressParser } from './input/keypress-parser.js';
export { KeyQueue } from './input/key-queue.js';
export type { KeySource } from './input/key-queue.js';

// Terminal
export { ProcessTerminal } from './terminal/terminal.js';
export type {
    Terminal,
    TerminalSize,
    ProcessTerminalOptions,
    Unsubscribe,
} from './terminal/terminal.js';
export { withTerminalSession } from './terminal/terminal-session.js';
export type { TerminalSession, TerminalSessionOptions } from './terminal/terminal-session.js';
export { ANSI } from './terminal/ansi.js';
export { TerminalError } from './terminal/errors.js';
export { TerminalErrorCode } from './terminal/error-codes.js';

// Rendering
export {
    ScreenRenderer,
    composeScreen,
    displayLine,
    frameFromWindow,
    SEPARATOR_CHAR,
} from './render/screen-renderer.js';
export type { ScreenFrame } from './render/screen-renderer.js';
