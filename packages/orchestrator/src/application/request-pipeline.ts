/**
 * @file packages/orchestrator/src/application/request-pipeline.ts
 * @description Guard stages that run before a turn: rate limit, identifier
 *              denylist and session validation. Each returns the response to
 *              short-circuit with, or lets the request through.
 */

import { inject, singleton } from 'tsyringe';
import type { SessionRecord } from '@ventanilla/shared';
import { RateLimiter } from '../domain/logic/rate-limiter.js';
import { SecurityValidator } from '../security/security-validator.js';
import { SessionManager } from './services/session-manager.js';
import {
  AppError,
  RateLimitError,
  SessionExpiredError,
  SessionNotFoundError,
  SessionValidationError,
  UnauthorizedError,
  ValidationError,
  errorMessage,
} from '../domain/errors/app-error.js';
import { Logger } from '../logger.js';

export interface OrchestratorResponse {
  statusCode: number;
  body: Record<string, unknown>;
}

export type GuardResult<T> = { ok: true; value: T } | { ok: false; response: OrchestratorResponse };

export const PIPELINE_ERRORS = {
  invalidPayload: 'Invalid JSON payload',
  missingIdentity: 'Missing session_id or user_id',
  missingCreateIdentity: 'Missing user_id or chat_id',
  invalidSessionId: 'Invalid session ID format',
  invalidUserId: 'Invalid user ID format',
} as const;

/**
 * Renders a rejection the way the HTTP error handler renders a thrown
 * `AppError`.
 */
export function reject(error: AppError): OrchestratorResponse {
  return { statusCode: error.statusCode, body: { error: error.publicMessage } };
}

const SESSION_REJECTIONS: Record<'not_found' | 'unauthorized' | 'expired', () => AppError> = {
  not_found: () => new SessionNotFoundError(),
  unauthorized: () => new UnauthorizedError(),
  expired: () => new SessionExpiredError(),
};

@singleton()
export class RequestPipeline {
  constructor(
    @inject(RateLimiter) private rateLimiter: RateLimiter,
    @inject(SecurityValidator) private security: SecurityValidator,
    @inject(SessionManager) private sessions: SessionManager,
    @inject(Logger) private logger: Logger,
  ) {}

  async admit(clientId: string): Promise<OrchestratorResponse | null> {
    if (await this.rateLimiter.admit(clientId)) return null;
    this.logger.warn(`Rate limit exceeded for client: ${clientId}`, {
      event: 'rate_limit_exceeded',
      clientId,
    });
    return reject(new RateLimitError());
  }

  checkIdentifiers(ids: { sessionId?: string; userId?: string }): OrchestratorResponse | null {
    if (ids.sessionId !== undefined && !this.security.isSafe(ids.sessionId)) {
      return reject(new ValidationError(PIPELINE_ERRORS.invalidSessionId));
    }
    if (ids.userId !== undefined && !this.security.isSafe(ids.userId)) {
      return reject(new ValidationError(PIPELINE_ERRORS.invalidUserId));
    }
    return null;
  }

  async authorize(sessionId: string, userId: string): Promise<GuardResult<SessionRecord>> {
    try {
      const result = await this.sessions.validate(sessionId, userId);
      if (result.ok) return { ok: true, value: result.session };
      return { ok: false, response: reject(SESSION_REJECTIONS[result.reason]()) };
    } catch (err) {
      this.logger.error(`Session validation error: ${errorMessage(err)}`, {
        event: 'session_validation_error',
        sessionId,
      });
      return { ok: false, response: reject(new SessionValidationError()) };
    }
  }
}
