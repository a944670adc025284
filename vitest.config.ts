import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        globals: true,
        include: [
            'shared/src/**/__tests__/**/*.test.ts',
            'server/src/**/__tests__/**/*.test.ts',
            'cli/src/**/__tests__/**/*.test.ts',
        ],
        setupFiles: ['server/src/__tests__/setup.ts'],
        reporters: ['default'],
        testTimeout: 20000,
    },
});
