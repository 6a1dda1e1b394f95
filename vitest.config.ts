// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig(() => {
  const isCI = process.env.CI === 'true';

  return {
    test: {
      globals: true,
      environment: 'node',
      env: {
        NODE_ENV: 'test'
      },
      include: [
        'src/**/__tests__/**/*.test.ts'
      ],
      exclude: [
        'node_modules',
        'dist'
      ],
      coverage: {
        enabled: false,
        provider: 'v8',
        reporter: isCI ? ['text'] : ['text', 'json', 'html'],
        exclude: [
          'node_modules',
          'dist',
          '**/__tests__/**',
          '**/*.d.ts'
        ],
      },
      testTimeout: isCI ? 15000 : 20000,
      hookTimeout: isCI ? 15000 : 20000,

      pool: 'forks',
      poolOptions: {
        forks: {
          singleFork: true
        }
      },

      sequence: {
        shuffle: false
      },

      retry: 0,
      bail: isCI ? 5 : 0,
      typecheck: {
        enabled: false
      },

      watch: false,
      clearMocks: true,
      restoreMocks: true
    }
  };
});
