// Editor model
export * from './editor/index.js';

// Documents
export * from './document/index.js';

// Configuration
export * from './config/index.js';

// Logging
export * from './logger/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export { ok, fail, unwrapOr } from './utils/result.js';
export type { Result } from './utils/result.js';
export { isErrnoException } from './utils/errno.js';
