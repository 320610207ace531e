/**
 * @file packages/shared/vitest.config.ts
 * @description Vitest project for the shared schemas.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'shared',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
  },
});
