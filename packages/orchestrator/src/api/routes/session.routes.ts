/**
 * @file packages/orchestrator/src/api/routes/session.routes.ts
 * @description Registers session creation and introspection.
 */

import type { FastifyInstance } from 'fastify';
import { container } from 'tsyringe';
import {
  SessionController,
  type SessionParams,
  type SessionQuery,
} from '../controllers/session.controller.js';

export async function sessionRoutes(app: FastifyInstance) {
  const controller = container.resolve(SessionController);

  app.post('/api/sessions', (req, reply) => controller.create(req, reply));
  app.get<{ Params: SessionParams; Querystring: SessionQuery }>('/api/sessions/:id', (req, reply) =>
    controller.describe(req, reply),
  );
}
