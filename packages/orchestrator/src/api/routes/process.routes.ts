/**
 * @file packages/orchestrator/src/api/routes/process.routes.ts
 * @description Registers the conversational turn endpoint.
 */

import type { FastifyInstance } from 'fastify';
import { container } from 'tsyringe';
import { ProcessController } from '../controllers/process.controller.js';

export async function processRoutes(app: FastifyInstance) {
  const controller = container.resolve(ProcessController);

  app.post('/api/process', (req, reply) => controller.process(req, reply));
}
