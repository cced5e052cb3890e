import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { isErrnoException } from '../utils/errno.js';
import { ConfigError, zodToIssues } from './errors.js';
import { EditorConfigSchema, type EditorConfig } from './schemas.js';

/**
 * Reads a YAML config file and returns its raw (unvalidated) content.
 *
 * An empty file yields `{}`.
 *
 * @throws {EditorRuntimeError} FILE_NOT_FOUND, FILE_READ_ERROR or PARSE_ERROR
 */
export async function loadConfigFile(configPath: string): Promise<Record<string, unknown>> {
    const absolutePath = path.resolve(configPath);

    let fileContent: string;
    try {
        fileContent = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            throw ConfigError.fileNotFound(absolutePath);
        }
        throw ConfigError.fileReadError(
            absolutePath,
            error instanceof Error ? error.message : String(error)
        );
    }

    let parsed: unknown;
    try {
        parsed = parseYaml(fileContent);
    } catch (error) {
        throw ConfigError.parseError(
            absolutePath,
            error instanceof Error ? error.message : String(error)
        );
    }

    if (parsed === null || parsed === undefined) {
        return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw ConfigError.parseError(absolutePath, 'top level must be a mapping');
    }
    return { ...parsed };
}

/**
 * Validates merged raw config and applies defaults.
 *
 * @throws {EditorRuntimeError} VALIDATION_FAILED with the zod issues in its context
 */
export function validateEditorConfig(raw: unknown): EditorConfig {
    const result = EditorConfigSchema.safeParse(raw);
    if (!result.success) {
        throw ConfigError.validationFailed(zodToIssues(result.error.issues));
    }
    return result.data;
}
