/**
 * @file packages/orchestrator/src/api/controllers/session.controller.ts
 * @description Session creation and introspection.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { inject, singleton } from 'tsyringe';
import { Orchestrator } from '../../application/orchestrator.js';

export interface SessionParams {
  id: string;
}

export interface SessionQuery {
  user_id?: string;
}

@singleton()
export class SessionController {
  constructor(@inject(Orchestrator) private orchestrator: Orchestrator) {}

  public async create(request: FastifyRequest, reply: FastifyReply) {
    const userAgent = request.headers['user-agent'];
    const result = await this.orchestrator.createSession(request.ip, request.body, {
      ipAddress: request.ip,
      ...(userAgent ? { userAgent } : {}),
    });
    return reply.status(result.statusCode).send(result.body);
  }

  public async describe(
    request: FastifyRequest<{ Params: SessionParams; Querystring: SessionQuery }>,
    reply: FastifyReply,
  ) {
    const result = await this.orchestrator.describeSession(
      request.ip,
      request.params.id,
      request.query.user_id,
    );
    return reply.status(result.statusCode).send(result.body);
  }
}
