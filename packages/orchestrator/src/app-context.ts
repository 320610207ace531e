/**
 * @file packages/orchestrator/src/app-context.ts
 * @description Owns the process lifecycle: container, HTTP server and the
 *              session sweeper.
 */

import type { FastifyInstance } from 'fastify';
import type { OrchestratorConfig } from '@ventanilla/shared';
import { setupContainer, type Collaborators, type ContainerHandle } from './container.js';
import { buildServer } from './server.js';
import { SessionSweeper } from './application/services/session-sweeper.js';
import { Logger } from './logger.js';

export class AppContext {
  private started = false;

  private constructor(
    readonly config: OrchestratorConfig,
    readonly server: FastifyInstance,
    private handle: ContainerHandle,
  ) {}

  static async create(
    config: OrchestratorConfig,
    overrides: Partial<Collaborators> = {},
  ): Promise<AppContext> {
    const handle = setupContainer(config, overrides);
    try {
      await handle.initialize();
      const server = await buildServer(config);
      return new AppContext(config, server, handle);
    } catch (err) {
      await handle.dispose();
      throw err;
    }
  }

  get logger(): Logger {
    return this.handle.container.resolve(Logger);
  }

  /**
   * Starts the sweeper and listens on the configured host and port.
   * @returns The address the server bound to.
   */
  async start(): Promise<string> {
    this.handle.container.resolve(SessionSweeper).start();
    const address = await this.server.listen({ host: this.config.host, port: this.config.port });
    this.started = true;
    this.logger.info(`[Orchestrator] Listening on ${address}`, {
      event: 'orchestrator_started',
      environment: this.config.environment,
    });
    return address;
  }

  async stop(): Promise<void> {
    this.handle.container.resolve(SessionSweeper).stop();
    await this.server.close();
    if (this.started) {
      this.logger.info('[Orchestrator] Stopped', { event: 'orchestrator_stopped' });
      this.started = false;
    }
    await this.handle.dispose();
  }
}
