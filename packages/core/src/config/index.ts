export {
    EditorConfigSchema,
    KeysConfigSchema,
    TerminalConfigSchema,
    UnknownKeyPolicySchema,
} from './schemas.js';
export type { EditorConfig, EditorConfigInput, UnknownKeyPolicy } from './schemas.js';
export { loadConfigFile, validateEditorConfig } from './loader.js';
export { ConfigError, zodToIssues } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
