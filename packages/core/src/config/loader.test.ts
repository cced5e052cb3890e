import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { EditorRuntimeError } from '../errors/EditorRuntimeError.js';
import { ConfigErrorCode } from './error-codes.js';
import { loadConfigFile, validateEditorConfig } from './loader.js';

describe('loadConfigFile', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'linedit-config-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    async function writeConfig(content: string): Promise<string> {
        const configPath = path.join(tempDir, 'linedit.yml');
        await fs.writeFile(configPath, content);
        return configPath;
    }

    it('should parse a YAML mapping', async () => {
        const configPath = await writeConfig('keys:\n  unknownKeyPolicy: ignore\n');

        expect(await loadConfigFile(configPath)).toEqual({
            keys: { unknownKeyPolicy: 'ignore' },
        });
    });

    it('should read an empty file as an empty mapping', async () => {
        const configPath = await writeConfig('');

        expect(await loadConfigFile(configPath)).toEqual({});
    });

    it('should fail with FILE_NOT_FOUND for a missing file', async () => {
        await expect(loadConfigFile(path.join(tempDir, 'absent.yml'))).rejects.toMatchObject({
            code: ConfigErrorCode.FILE_NOT_FOUND,
        });
    });

    it('should fail with PARSE_ERROR for malformed YAML', async () => {
        const configPath = await writeConfig('keys: [\n');

        await expect(loadConfigFile(configPath)).rejects.toMatchObject({
            code: ConfigErrorCode.PARSE_ERROR,
        });
    });

    it('should fail with PARSE_ERROR when the top level is not a mapping', async () => {
        const configPath = await writeConfig('- one\n- two\n');

        await expect(loadConfigFile(configPath)).rejects.toMatchObject({
            code: ConfigErrorCode.PARSE_ERROR,
            context: { cause: 'top level must be a mapping' },
        });
    });
});

describe('validateEditorConfig', () => {
    it('should fill in every default', () => {
        expect(validateEditorConfig({})).toEqual({
            logger: { level: 'info', transports: [{ type: 'silent' }] },
            keys: { unknownKeyPolicy: 'insert-code' },
            terminal: { alternateScreen: true, fallbackColumns: 80, fallbackRows: 24 },
        });
    });

    it('should apply defaults inside a file transport', () => {
        const config = validateEditorConfig({
            logger: { level: 'debug', transports: [{ type: 'file', path: '/tmp/linedit.log' }] },
        });

        expect(config.logger.transports).toEqual([
            { type: 'file', path: '/tmp/linedit.log', maxSize: 5 * 1024 * 1024, maxFiles: 3 },
        ]);
    });

    it('should report the path of an invalid value', () => {
        let caught: unknown;
        try {
            validateEditorConfig({ keys: { unknownKeyPolicy: 'beep' } });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(EditorRuntimeError);
        expect(caught).toMatchObject({
            code: ConfigErrorCode.VALIDATION_FAILED,
            context: { issues: [{ path: ['keys', 'unknownKeyPolicy'] }] },
        });
    });

    it('should reject unknown top-level keys', () => {
        expect(() => validateEditorConfig({ colors: true })).toThrow(EditorRuntimeError);
    });

    it('should reject a viewport fallback too small for the header', () => {
        expect(() => validateEditorConfig({ terminal: { fallbackRows: 2 } })).toThrow(
            /terminal\.fallbackRows/
        );
    });
});
