import 'reflect-metadata';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { container } from 'tsyringe';
import { errorHandler } from './error-handler.js';
import { InternalError, SessionExpiredError } from '../../domain/errors/app-error.js';
import { Logger } from '../../logger.js';

describe('errorHandler', () => {
  let app: FastifyInstance;

  beforeEach(() => {
    container.register(Logger, { useValue: new Logger({ level: 'silent', pretty: false }) });
    app = Fastify({ logger: false });
    app.setErrorHandler(errorHandler);
    app.get('/expired', async () => {
      throw new SessionExpiredError();
    });
    app.get('/internal', async () => {
      throw new InternalError('connection string postgres://test-user@db');
    });
    app.get('/crash', async () => {
      throw new Error('undefined is not a function');
    });
  });

  afterEach(async () => {
    await app.close();
    container.clearInstances();
  });

  it('answers an operational error with its own status and message', async () => {
    const response = await app.inject({ method: 'GET', url: '/expired' });
    expect(response.statusCode).toBe(440);
    expect(response.json()).toEqual({ error: 'Session expired' });
  });

  it('hides the message of a programming error', async () => {
    const response = await app.inject({ method: 'GET', url: '/internal' });
    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Internal processing error' });
  });

  it('reports unknown errors as internal', async () => {
    const response = await app.inject({ method: 'GET', url: '/crash' });
    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Internal processing error' });
  });
});
