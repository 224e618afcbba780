import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration.
 *
 * Tests sit beside their sources in `__tests__/` directories. None of them
 * reach MongoDB or Redis; the connection strings only satisfy env parsing.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        testTimeout: 90_000,
        hookTimeout: 90_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test',
            MONGODB_URI: 'mongodb://localhost:27017/test',
            REDIS_URL: 'redis://localhost:6379'
        }
    }
});
