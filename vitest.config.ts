import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@care-companion/shared': path.resolve(__dirname, 'shared/src/index.ts'),
            '@care-companion/assistant': path.resolve(__dirname, 'assistant/index.ts'),
        },
    },
    test: {
        include: ['shared/src/**/*.test.ts', 'assistant/**/*.test.ts', 'services/*/src/**/*.test.ts'],
        environment: 'node',
        env: {
            LOG_LEVEL: 'silent',
        },
    },
});
