export { Cursor } from './cursor.js';
export { TextBuffer } from './text-buffer.js';
export { EditorWindow } from './editor-window.js';
export { formatHeader } from './header.js';
export { HEADER_HEIGHT, HELP_TEXT } from './types.js';
export type { LineSource, ScreenPosition, Viewport } from './types.js';
