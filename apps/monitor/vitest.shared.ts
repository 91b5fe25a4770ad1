/**
 * Shared Vitest configuration
 *
 * Base settings used by every test config. Import and merge with
 * config-specific settings.
 */

import { fileURLToPath } from 'node:url';
import type { UserConfig } from 'vitest/config';

const isCI = process.env.CI === 'true' || process.env.GITHUB_ACTIONS === 'true';

export const sharedConfig: UserConfig = {
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./src/test/setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,
    reporters: isCI ? ['default', 'github-actions'] : ['default'],
  },
  resolve: {
    alias: {
      '@zurgmon/shared': fileURLToPath(new URL('../../packages/shared/src/index.ts', import.meta.url)),
    },
  },
};
