/**
 * @file packages/orchestrator/src/api/routes/health.routes.ts
 * @description Registers the health endpoint.
 */

import type { FastifyInstance } from 'fastify';
import { container } from 'tsyringe';
import { HealthController } from '../controllers/health.controller.js';

export async function healthRoutes(app: FastifyInstance) {
  const controller = container.resolve(HealthController);

  app.get('/api/health', (req, reply) => controller.check(req, reply));
}
