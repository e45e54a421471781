import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        }
    },
    test: {
        environment: 'node',
        include: ['tests/unit/**/*.spec.ts'],
        // Timeouts to prevent hung processes
        testTimeout: 10000,
        hookTimeout: 10000,
    }
});
