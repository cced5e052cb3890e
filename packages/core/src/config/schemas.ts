/**
 * Editor Configuration Schemas
 */

import { z } from 'zod';
import { LoggerConfigSchema } from '../logger/schemas.js';

export const UnknownKeyPolicySchema = z
    .enum(['insert-code', 'ignore'])
    .describe(
        'What to do with a key that is neither bound nor printable: insert its decimal code, or drop it'
    );

export type UnknownKeyPolicy = z.output<typeof UnknownKeyPolicySchema>;

export const KeysConfigSchema = z
    .object({
        unknownKeyPolicy: UnknownKeyPolicySchema.default('insert-code'),
    })
    .strict();

export const TerminalConfigSchema = z
    .object({
        alternateScreen: z
            .boolean()
            .default(true)
            .describe('Draw on the alternate screen so the shell is restored on exit'),
        fallbackColumns: z
            .number()
            .int()
            .positive()
            .default(80)
            .describe('Width used when the output stream does not report one'),
        fallbackRows: z
            .number()
            .int()
            .min(3)
            .default(24)
            .describe('Height used when the output stream does not report one'),
    })
    .strict();

export const EditorConfigSchema = z
    .object({
        logger: LoggerConfigSchema.default({}),
        keys: KeysConfigSchema.default({}),
        terminal: TerminalConfigSchema.default({}),
    })
    .strict()
    .describe('linedit configuration');

export type EditorConfig = z.output<typeof EditorConfigSchema>;
export type EditorConfigInput = z.input<typeof EditorConfigSchema>;
