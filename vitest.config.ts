import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['apps/api/test/**/*.test.ts'],
        testTimeout: 10000,
    },
});
