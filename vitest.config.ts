import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Enable globals (describe, it, expect) without imports
        globals: true,

        environment: 'node',

        include: ['src/**/*.test.ts'],

        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            include: ['src/**/*.ts'],
            exclude: ['src/**/*.test.ts', 'src/**/index.ts'],
            reportsDirectory: './coverage',
        },

        // Searches at depth 2-3 scan the whole board per node
        testTimeout: 20000,
    },
});
