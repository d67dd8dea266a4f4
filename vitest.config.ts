import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
            ENABLE_LOGS: 'false',
            GOOGLE_GEMINI_API_KEY: 'test-key',
        },
    },
});
