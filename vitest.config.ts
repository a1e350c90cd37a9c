import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/__tests__/**/*.test.ts'],
        environment: 'node',
        env: {
            LOG_LEVEL: 'silent',
            MONGO_DB_NAME: 'portal_sync_test',
        },
    },
});
