/**
 * Main Vitest Configuration
 *
 * Runs every test with `npm test`; `npm run test:coverage` adds a v8 report.
 */

import { defineConfig, mergeConfig } from 'vitest/config';
import { sharedConfig } from './vitest.shared.js';

export default mergeConfig(
  sharedConfig,
  defineConfig({
    test: {
      include: ['src/**/*.test.ts'],
      exclude: ['**/node_modules/**', '**/dist/**'],
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json-summary', 'html'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: [
          '**/*.test.ts',
          '**/test/**',
          // Type-only files with no executable code
          '**/types.ts',
          // Process entry point
          'src/index.ts',
        ],
      },
    },
  })
);
