/**
 * @file packages/orchestrator/vitest.config.ts
 * @description Vitest project for the orchestrator service.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'orchestrator',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    setupFiles: ['reflect-metadata'],
  },
});
