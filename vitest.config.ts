import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true, // Use Vitest globals (describe, it, expect) like Jest
    environment: 'node', // Specify the test environment
    // Use forks pool for cleaner process termination (prevents orphaned workers)
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true, // Use single fork to minimize process spawning
      },
    },
    // Ensure proper cleanup on exit
    teardownTimeout: 5000,
    include: [
      'src/tests/**/*.test.ts'
    ],
    exclude: ['**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'src/**/*.ts'
      ],
      exclude: [
        'src/tests/**',
        'dist/**',
        '**/node_modules/**',
        '*.config.*'
      ],
      thresholds: {
        lines: 70,
        statements: 70,
        functions: 70,
        branches: 60,
        'src/services/time/**/*.ts': {
          lines: 85,
          statements: 85,
          functions: 90,
          branches: 75
        }
      }
    },
  },
})
