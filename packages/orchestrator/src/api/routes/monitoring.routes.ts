/**
 * @file packages/orchestrator/src/api/routes/monitoring.routes.ts
 * @description Registers the metrics and alerts endpoints.
 */

import type { FastifyInstance } from 'fastify';
import { container } from 'tsyringe';
import { MonitoringController } from '../controllers/monitoring.controller.js';

export async function monitoringRoutes(app: FastifyInstance) {
  const controller = container.resolve(MonitoringController);

  app.get('/api/metrics', (req, reply) => controller.metrics(req, reply));
  app.get('/api/alerts', (req, reply) => controller.alerts(req, reply));
}
