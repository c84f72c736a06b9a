import path from 'path'

import { defineConfig } from 'vitest/config'

const src = (dir: string) => path.resolve(__dirname, './src', dir)

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'coverage/**',
        'dist/**',
        'src/boot/main.ts',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      // Mirrors tsconfig.json "paths"
      '@boot': src('boot'),
      '@core': src('core'),
      '@display': src('display'),
      '@hardware': src('hardware'),
      '@logging': src('logging'),
      '@system': src('system'),
      '@utils': src('utils'),
      '@validation': src('validation'),
      '$types': src('types'),
    },
  },
})
