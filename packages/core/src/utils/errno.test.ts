import { describe, test, expect } from 'vitest';
import { isErrnoException } from './errno.js';

describe('isErrnoException', () => {
    test('accepts errors carrying a code', () => {
        const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
        expect(isErrnoException(error)).toBe(true);
    });

    test('rejects plain errors and non-errors', () => {
        expect(isErrnoException(new Error('plain'))).toBe(false);
        expect(isErrnoException({ code: 'ENOENT' })).toBe(false);
    });
});
