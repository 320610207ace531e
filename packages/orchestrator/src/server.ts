/**
 * @file packages/orchestrator/src/server.ts
 * @description Fastify application: CORS, security headers, response
 *              sanitisation and the API routes. Collaborators are resolved
 *              from the container, so `setupContainer` must run first.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { container } from 'tsyringe';
import type { OrchestratorConfig } from '@ventanilla/shared';
import { SecurityValidator } from './security/security-validator.js';
import { errorHandler } from './api/middleware/error-handler.js';
import { securityHeaders } from './api/middleware/security-headers.js';
import { processRoutes } from './api/routes/process.routes.js';
import { sessionRoutes } from './api/routes/session.routes.js';
import { healthRoutes } from './api/routes/health.routes.js';
import { monitoringRoutes } from './api/routes/monitoring.routes.js';

export async function buildServer(config: OrchestratorConfig): Promise<FastifyInstance> {
  const app = Fastify({ logger: false, trustProxy: true });

  await app.register(cors, {
    origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
    methods: ['GET', 'PUT', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  const security = container.resolve(SecurityValidator);
  app.addHook('onSend', securityHeaders);
  app.addHook('preSerialization', async (_request, _reply, payload: unknown) =>
    security.sanitizeResponse(payload),
  );

  app.setErrorHandler(errorHandler);
  app.setNotFoundHandler((_request, reply) => reply.status(404).send({ error: 'Not found' }));

  await app.register(processRoutes);
  await app.register(sessionRoutes);
  await app.register(healthRoutes);
  await app.register(monitoringRoutes);

  return app;
}
