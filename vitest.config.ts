import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        // Forks keep process.stdin and signal listeners isolated per test file
        pool: 'forks',
        poolOptions: {
            forks: {
                maxForks: 2,
                minForks: 1
            }
        },
        testTimeout: 10000,
        hookTimeout: 10000,
        teardownTimeout: 10000,
        coverage: {
            provider: 'v8',
            reporter: ['text', 'lcov', 'html'],
            all: true,
            include: ['src/**/*.ts'],
            exclude: ['src/main.ts'],
            thresholds: {
                statements: 80,
                branches: 75,
                functions: 80,
                lines: 80,
            }
        },
    },
});
