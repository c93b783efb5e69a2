import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        environment: 'node',
        env: {
            TALLY_LOG_LEVEL: 'silent',
        },
    },
});
