import { defineConfig } from 'tsup';

export default defineConfig([
    // CLI entry: ESM bundle with the workspace packages inlined
    {
        entry: ['packages/cli/src/index.ts'],
        format: ['esm'],
        outDir: 'packages/cli/dist',
        platform: 'node',
        target: 'node20',
        shims: true,
        clean: true,
        noExternal: ['@linedit/core', '@linedit/tui'],
        external: ['chalk', 'commander', 'yaml', 'zod'],
    },
]);
