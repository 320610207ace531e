/**
 * @file packages/orchestrator/src/api/controllers/process.controller.ts
 * @description Inbound conversational turns.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { inject, singleton } from 'tsyringe';
import { Orchestrator } from '../../application/orchestrator.js';

@singleton()
export class ProcessController {
  constructor(@inject(Orchestrator) private orchestrator: Orchestrator) {}

  /**
   * Runs one turn for the caller; the client address is the rate-limit key.
   */
  public async process(request: FastifyRequest, reply: FastifyReply) {
    const result = await this.orchestrator.process(request.ip, request.body);
    return reply.status(result.statusCode).send(result.body);
  }
}
