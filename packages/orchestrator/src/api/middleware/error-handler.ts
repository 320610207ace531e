import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { container } from 'tsyringe';
import { AppError, INTERNAL_ERROR_MESSAGE } from '../../domain/errors/app-error.js';
import { PIPELINE_ERRORS } from '../../application/request-pipeline.js';
import { Logger } from '../../logger.js';

export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
  const logger = container.resolve(Logger);

  if (error instanceof AppError) {
    if (error.isOperational) {
      logger.warn(`Operational Error: ${error.message}`, { statusCode: error.statusCode, url: request.url });
    } else {
      logger.error(`Programming Error: ${error.message}`, { statusCode: error.statusCode, url: request.url });
    }
    return reply.status(error.statusCode).send({ error: error.publicMessage });
  }

  // Schema validation and body parsing failures
  if (error.validation) {
    return reply.status(400).send({ error: 'Validation failed' });
  }
  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    return reply
      .status(error.statusCode)
      .send({ error: error.statusCode === 400 ? PIPELINE_ERRORS.invalidPayload : error.message });
  }

  logger.error(`Unhandled Error: ${error.message}`, { url: request.url, stack: error.stack });
  return reply.status(500).send({ error: INTERNAL_ERROR_MESSAGE });
}
