import { defineConfig } from 'vitest/config'

export default defineConfig({
  cacheDir: './.vitest',
  test: {
    environment: 'node',
    testTimeout: 20000,
    hookTimeout: 20000,
    // Prefer explicit imports over implicit globals for clarity
    globals: false,
    setupFiles: ['./tests/vitest/vitest-setup.ts'],
    include: ['src/**/*.{test,spec}.ts', 'tests/**/*.{test,spec}.ts'],
    exclude: ['dist/**', '**/node_modules/**', '**/*.d.ts'],
    reporters: process.env.CI ? ['junit', 'default'] : ['default'],
    ...(process.env.CI
      ? { outputFile: { junit: './test-results/junit.xml' } }
      : {}),
    isolate: true,
    pool: 'threads',
    allowOnly: false,
    coverage: {
      provider: 'v8',
      reporter: ['text-summary', 'html'],
      reportsDirectory: './coverage',
      exclude: [
        'src/**/*.d.ts',
        '**/__tests__/**',
        'dist/**',
        'vitest.config.*',
        'tests/**',
        'src/cli/index.ts',
      ],
    },
    // Randomize order to catch hidden state coupling (stable seed in CI)
    sequence: {
      shuffle: true,
      ...(process.env.CI ? { seed: 20241018 } : {}),
    },
  },
})
