export { DocumentStore } from './document-store.js';
export { DocumentError } from './errors.js';
export { DocumentErrorCode } from './error-codes.js';
export { joinLines, splitLines } from './line-codec.js';
export type { DocumentStorage, LoadFailure, LoadFailureKind } from './types.js';
