/**
 * @file packages/orchestrator/src/infrastructure/config/config-service.ts
 * @description Typed, read-only access to the validated orchestrator configuration.
 */

import { inject, singleton } from 'tsyringe';
import type { OrchestratorConfig } from '@ventanilla/shared';
import { TOKENS } from '../../domain/interfaces/tokens.js';

/**
 * Encapsulates config service behavior.
 */
@singleton()
export class ConfigService {
  constructor(@inject(TOKENS.Config) private config: OrchestratorConfig) {}

  /**
   * Returns one configuration section.
   */
  public get<K extends keyof OrchestratorConfig>(key: K): OrchestratorConfig[K] {
    return this.config[key];
  }
}
