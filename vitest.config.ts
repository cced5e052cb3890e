import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            // Workspace aliases so tests run against sources without a build
            '@linedit/core/test-utils': fromRoot('./packages/core/src/test-utils/index.ts'),
            '@linedit/core': fromRoot('./packages/core/src/index.ts'),
            '@linedit/tui/test-utils': fromRoot('./packages/tui/src/test-utils/index.ts'),
            '@linedit/tui': fromRoot('./packages/tui/src/index.ts'),
        },
    },
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        watch: false,
    },
});
