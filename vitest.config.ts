import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        reporters: 'default',
        include: ['src/**/__tests__/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'error',
            LOG_TO_FILE: 'false',
        },
    },
});
