/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Node environment — no DOM
        environment: 'node',

        include: ['src/**/*.test.ts'],

        // bcrypt at 12 rounds is slow in pure JS
        testTimeout: 20_000,

        globals: true,

        // Secrets and drivers for every suite; individual tests build their
        // own config objects where they need something different.
        env: {
            NODE_ENV: 'test',
            STORAGE_DRIVER: 'memory',
            JWT_SECRET: 'test-secret-for-vitest-only',
            LOG_LEVEL: 'silent',
        },

        coverage: {
            provider: 'v8',
            reporter: ['text', 'lcov'],
            include: ['src/services/**/*.ts', 'src/lib/**/*.ts'],
        },
    },
});
