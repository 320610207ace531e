/**
 * @file vitest.workspace.ts
 * @description Runs every workspace package's Vitest project from the root.
 */

import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/shared', 'packages/orchestrator']);
