/**
 * @file packages/shared/src/index.ts
 * @description Public surface of the shared package.
 */

export * from './types.js';
export * from './protocol.js';
export * from './constants.js';
export * from './intents.js';
export * from './types/config.js';
