import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        coverage: {
            reporter: ['text', 'lcov'],
            exclude: ['**/node_modules/**', '**/dist/**', '**/*.test.ts'],
        },
    },
});
