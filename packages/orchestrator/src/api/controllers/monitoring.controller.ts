/**
 * @file packages/orchestrator/src/api/controllers/monitoring.controller.ts
 * @description Read-only views over recent metrics and alerts.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { inject, singleton } from 'tsyringe';
import { MonitoringManager } from '../../application/services/monitoring-manager.js';
import { FeatureDisabledError } from '../../domain/errors/app-error.js';

const ALERT_LIMIT = 50;

@singleton()
export class MonitoringController {
  constructor(@inject(MonitoringManager) private monitoring: MonitoringManager) {}

  public async metrics(_request: FastifyRequest, reply: FastifyReply) {
    if (!this.monitoring.metricsEnabled) {
      throw new FeatureDisabledError('Metrics disabled');
    }
    const snapshot = this.monitoring.snapshot();
    return reply.send({
      timestamp: snapshot.timestamp,
      request_metrics: snapshot.requestMetrics,
      system_metrics: {
        cpu_usage: snapshot.systemMetrics.cpuUsage,
        memory_usage: snapshot.systemMetrics.memoryUsage,
      },
    });
  }

  public async alerts(_request: FastifyRequest, reply: FastifyReply) {
    const alerts = this.monitoring.recentAlerts(ALERT_LIMIT).map((alert) => ({
      alert_type: alert.alertType,
      message: alert.message,
      timestamp: new Date(alert.timestamp).toISOString(),
      service: alert.service,
    }));
    return reply.send({
      alerts,
      total_count: alerts.length,
      timestamp: new Date().toISOString(),
    });
  }
}
