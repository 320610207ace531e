/**
 * @file packages/orchestrator/src/api/controllers/health.controller.ts
 * @description Liveness plus the state of the session store and rate-limit backend.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { inject, singleton } from 'tsyringe';
import { SERVICE_NAME, VENTANILLA_VERSION } from '@ventanilla/shared';
import { TOKENS } from '../../domain/interfaces/tokens.js';
import type { SessionStore } from '../../domain/interfaces/session-store.interface.js';
import { RateLimiter } from '../../domain/logic/rate-limiter.js';
import { MonitoringManager } from '../../application/services/monitoring-manager.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { errorMessage } from '../../domain/errors/app-error.js';
import { Logger } from '../../logger.js';

const CONNECTED = 'connected';

@singleton()
export class HealthController {
  constructor(
    @inject(TOKENS.SessionStore) private store: SessionStore,
    @inject(RateLimiter) private rateLimiter: RateLimiter,
    @inject(MonitoringManager) private monitoring: MonitoringManager,
    @inject(ConfigService) private config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {}

  /**
   * 200 when every component answers, 503 otherwise.
   */
  public async check(_request: FastifyRequest, reply: FastifyReply) {
    const [sessionStore, rateLimiter] = await Promise.all([
      this.probe('session_store', () => this.store.ping()),
      this.probe('rate_limiter', () => this.rateLimiter.ping()),
    ]);
    const healthy = sessionStore === CONNECTED && rateLimiter === CONNECTED;
    const { cpuPercent, memoryPercent } = this.monitoring.hostUsage();
    const rateLimit = this.rateLimiter.describe();
    const monitoring = this.config.get('monitoring');

    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'healthy' : 'degraded',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      environment: this.config.get('environment'),
      version: VENTANILLA_VERSION,
      system_resources: {
        cpu_usage_percent: cpuPercent,
        memory_usage_percent: memoryPercent,
      },
      components: {
        session_store: sessionStore,
        rate_limiter: rateLimiter,
      },
      rate_limiting: {
        enabled: true,
        storage: rateLimit.storage,
        window_seconds: rateLimit.windowSeconds,
        max_requests: rateLimit.maxRequests,
      },
      monitoring: {
        enabled: this.monitoring.metricsEnabled,
        retention_days: monitoring.retentionDays,
      },
    });
  }

  private async probe(component: string, ping: () => Promise<void>): Promise<string> {
    try {
      await ping();
      return CONNECTED;
    } catch (err) {
      this.logger.warn(`[Health] ${component} check failed`, {
        event: 'health_check_failed',
        component,
        error: errorMessage(err),
      });
      return `disconnected: ${errorMessage(err)}`;
    }
  }
}
