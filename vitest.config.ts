import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * `npm test` at the root runs every colocated test in the workspaces. The env
 * block satisfies the zod schema in `config/env.ts` for tests that load it;
 * nothing connects to the URIs below.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        testTimeout: 30_000,
        hookTimeout: 30_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test',
            MONGODB_URI: 'mongodb://localhost:27017/test',
            YOUTUBE_API_KEY: 'test-youtube-key',
            ADMIN_TELEGRAM_ID: '1000'
        }
    }
});
