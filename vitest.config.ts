import { defineConfig } from 'vitest/config'

/**
 * Vitest config. Every test runs in Node against temporary repositories
 * built on disk; nothing is spawned.
 *
 * Run with: npx vitest run
 */
export default defineConfig({
  test: {
    globals: true,
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli/bin.ts', '**/test/**', '**/dist/**'],
      thresholds: {
        lines: 70,
        branches: 60,
        functions: 70,
        statements: 70,
      },
    },
  },
})
