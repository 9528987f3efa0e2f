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
            exclude: ['src/**/*.test.ts', 'src/cli/index.ts'],
            reportsDirectory: './coverage',
        },

        // Deep searches in the search tests take a few seconds
        testTimeout: 20000,
    },
});
