export { EditorRuntimeError, toEditorRuntimeError } from './EditorRuntimeError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { EditorErrorCode, Issue, Severity } from './types.js';
