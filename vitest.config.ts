import { defineConfig } from 'vitest/config';
import { loadEnv } from 'vite';

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), '');

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      testTimeout: 30000,
      env: {
        ...env,
        NODE_ENV: 'test',
        LOG_LEVEL: env['LOG_LEVEL'] ?? 'silent',
        SNAPSHOT_BACKEND: 'memory',
      },
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json', 'html'],
        exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'src/execution/tests/setup.ts'],
      },
    },
  };
});
