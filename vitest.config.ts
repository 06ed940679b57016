import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/*.{test,spec}.ts'],
        testTimeout: 15_000,
    },
});
