import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Config and logger tests touch process-wide state
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/types/**',
        '**/*.d.ts',
      ],
    },
    include: ['packages/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});
