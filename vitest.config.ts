import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/server.ts', // Process entry point, exercised through its parts
      ],
    },
    env: {
      TOOLBOX_ENV: 'test',
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
