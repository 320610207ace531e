/**
 * @file packages/orchestrator/src/application/orchestrator.ts
 * @description Entry point for a conversational turn: runs the request
 *              pipeline, then the turn state machine.
 */

import { inject, singleton } from 'tsyringe';
import {
  branchFor,
  parseCreateSessionRequest,
  parseProcessRequest,
  type IntentClassification,
  type SessionMetadata,
  type SessionRecord,
} from '@ventanilla/shared';
import {
  PIPELINE_ERRORS,
  RequestPipeline,
  reject,
  type OrchestratorResponse,
} from './request-pipeline.js';
import { ContextManager, type ConversationContext } from './services/context-manager.js';
import { MonitoringManager } from './services/monitoring-manager.js';
import { SessionManager } from './services/session-manager.js';
import { ConversationFlows } from './flows/conversation-flows.js';
import { IntentClassifier } from '../domain/logic/intent-classifier.js';
import { AgentRouter } from '../domain/logic/agent-router.js';
import { SecurityValidator } from '../security/security-validator.js';
import {
  INTERNAL_ERROR_MESSAGE,
  InternalError,
  ValidationError,
  errorMessage,
} from '../domain/errors/app-error.js';
import { Logger } from '../logger.js';

export type TurnStage =
  | 'VALIDATING'
  | 'CONTEXT_LOADED'
  | 'CLASSIFIED'
  | 'CLARIFYING'
  | 'ESCALATING'
  | 'GENERAL_REPLY'
  | 'ROUTED'
  | 'CONTEXT_PERSISTED'
  | 'DONE'
  | 'FAILED';

export const SECURITY_THREAT_ERROR = 'Invalid input detected - potential security threat';
export const INTERNAL_ERROR = INTERNAL_ERROR_MESSAGE;

const MAX_SESSION_VALUE = 10;

/** Seconds since `startedAt`, to the millisecond. */
export const elapsedSeconds = (startedAt: number, now: number = Date.now()): number =>
  Math.round(now - startedAt) / 1000;

/**
 * Picks the text of a reply worth keeping in history: the `response` or
 * `message` field, when it is a string.
 */
export function replyTextOf(body: Record<string, unknown>): string | null {
  if (typeof body.response === 'string') return body.response;
  if (typeof body.message === 'string') return body.message;
  return null;
}

@singleton()
export class Orchestrator {
  constructor(
    @inject(RequestPipeline) private pipeline: RequestPipeline,
    @inject(SessionManager) private sessions: SessionManager,
    @inject(SecurityValidator) private security: SecurityValidator,
    @inject(ContextManager) private contexts: ContextManager,
    @inject(IntentClassifier) private classifier: IntentClassifier,
    @inject(AgentRouter) private router: AgentRouter,
    @inject(ConversationFlows) private flows: ConversationFlows,
    @inject(MonitoringManager) private monitoring: MonitoringManager,
    @inject(Logger) private logger: Logger,
  ) {}

  /**
   * Handles one inbound message from `clientId` (the caller's address).
   */
  async process(clientId: string, payload: unknown): Promise<OrchestratorResponse> {
    const limited = await this.pipeline.admit(clientId);
    if (limited) return limited;

    const parsed = parseProcessRequest(payload);
    if (!parsed.ok) {
      return reject(
        new ValidationError(
          parsed.reason === 'missing_identity'
            ? PIPELINE_ERRORS.missingIdentity
            : PIPELINE_ERRORS.invalidPayload,
        ),
      );
    }
    const { session_id: sessionId, user_id: userId, text } = parsed.request;

    const badId = this.pipeline.checkIdentifiers({ sessionId, userId });
    if (badId) return badId;

    const session = await this.pipeline.authorize(sessionId, userId);
    if (!session.ok) return session.response;

    return this.runTurn(session.value, text);
  }

  /**
   * Opens a session for `user_id`/`chat_id`.
   */
  async createSession(
    clientId: string,
    payload: unknown,
    metadata: SessionMetadata = {},
  ): Promise<OrchestratorResponse> {
    const limited = await this.pipeline.admit(clientId);
    if (limited) return limited;

    const parsed = parseCreateSessionRequest(payload);
    if (!parsed.ok) {
      return reject(
        new ValidationError(
          parsed.reason === 'missing_identity'
            ? PIPELINE_ERRORS.missingCreateIdentity
            : PIPELINE_ERRORS.invalidPayload,
        ),
      );
    }

    const badId = this.pipeline.checkIdentifiers({ userId: parsed.request.user_id });
    if (badId) return badId;

    const sessionId = await this.sessions.create(
      parsed.request.user_id,
      parsed.request.chat_id,
      metadata,
    );
    return { statusCode: 201, body: { session_id: sessionId } };
  }

  /**
   * Session introspection; subject to the same guards as a turn.
   */
  async describeSession(
    clientId: string,
    sessionId: string,
    userId: string | undefined,
  ): Promise<OrchestratorResponse> {
    const limited = await this.pipeline.admit(clientId);
    if (limited) return limited;

    if (!userId?.trim()) return reject(new ValidationError(PIPELINE_ERRORS.missingIdentity));

    const badId = this.pipeline.checkIdentifiers({ sessionId, userId });
    if (badId) return badId;

    const session = await this.pipeline.authorize(sessionId, userId.trim());
    if (!session.ok) return session.response;

    return { statusCode: 200, body: describe(session.value) };
  }

  /**
   * The turn state machine. Upstream failures are answered in-band; anything
   * unexpected ends in FAILED with a generic 500, logged with the stage it
   * escaped from.
   */
  async runTurn(session: SessionRecord, text: string): Promise<OrchestratorResponse> {
    const startedAt = Date.now();
    const sessionId = session.id;
    let stage: TurnStage = 'VALIDATING';

    try {
      if (!this.security.isSafe(text)) {
        this.logger.warn(SECURITY_THREAT_ERROR, { event: 'security_violation', sessionId, stage });
        this.monitoring.record('security_violation', 1);
        return {
          statusCode: 400,
          body: {
            error: SECURITY_THREAT_ERROR,
            metadata: {
              processing_time: elapsedSeconds(startedAt),
              timestamp: new Date().toISOString(),
            },
          },
        };
      }

      const context = await this.contexts.load(sessionId, text);
      stage = 'CONTEXT_LOADED';

      const classification = await this.classifier.classify(text, context.recentMessages);
      stage = 'CLASSIFIED';
      this.logger.info(
        `Intent classified: ${classification.intent} (confidence: ${classification.confidence.toFixed(2)})`,
        { event: 'intent_classified', sessionId, intent: classification.intent },
      );

      let body: Record<string, unknown>;
      const branch = branchFor(classification.intent);
      switch (branch.kind) {
        case 'clarify':
          stage = 'CLARIFYING';
          body = { ...(await this.flows.clarify(text, context.recentMessages, classification.confidence)) };
          break;
        case 'escalate':
          stage = 'ESCALATING';
          body = { ...(await this.flows.escalate(text, context.recentMessages)) };
          break;
        case 'general':
          stage = 'GENERAL_REPLY';
          body = { ...this.flows.generalReply(branch.intent) };
          break;
        case 'route': {
          stage = 'ROUTED';
          const routed = await this.router.dispatch(branch.intent, text, context);
          body = routed.ok ? { ...routed.payload } : { ...routed.body };
          break;
        }
        default: {
          const unhandled: never = branch;
          throw new Error(`Unhandled branch: ${JSON.stringify(unhandled)}`);
        }
      }

      await this.persist(context, replyTextOf(body));
      stage = 'CONTEXT_PERSISTED';

      const processingTime = elapsedSeconds(startedAt);
      this.monitoring.record('request_processing_time', processingTime, {
        intent: classification.intent,
        confidence: String(classification.confidence),
      });
      this.monitoring.checkAlerts();
      stage = 'DONE';

      return {
        statusCode: 200,
        body: { ...body, metadata: this.metadata(processingTime, classification, sessionId) },
      };
    } catch (err) {
      this.logger.error(`Orchestrator processing error: ${errorMessage(err)}`, {
        event: 'processing_error',
        sessionId,
        stage,
        processingTime: elapsedSeconds(startedAt),
      });
      this.monitoring.record('processing_error', 1);
      const failure = new InternalError();
      return {
        statusCode: failure.statusCode,
        body: {
          error: failure.publicMessage,
          metadata: {
            processing_time: elapsedSeconds(startedAt),
            timestamp: new Date().toISOString(),
            session_id: sessionId,
          },
        },
      };
    }
  }

  private async persist(context: ConversationContext, replyText: string | null): Promise<void> {
    try {
      await this.contexts.commitTurn(context, replyText);
    } catch (err) {
      this.logger.error(`Error updating session after response: ${errorMessage(err)}`, {
        event: 'session_update_error',
        sessionId: context.sessionId,
      });
      this.monitoring.record('session_update_error', 1);
    }
  }

  private metadata(
    processingTime: number,
    classification: IntentClassification,
    sessionId: string,
  ): Record<string, unknown> {
    return {
      processing_time: processingTime,
      intent: classification.intent,
      confidence: classification.confidence,
      timestamp: new Date().toISOString(),
      session_id: sessionId,
    };
  }
}

/**
 * Public view of a session for the introspection endpoint.
 */
export function describe(session: SessionRecord): Record<string, unknown> {
  const messageCount = session.messages.length;
  return {
    session_id: session.id,
    user_id: session.userId,
    chat_id: session.chatId,
    created_at: new Date(session.createdAt).toISOString(),
    last_active: new Date(session.lastActive).toISOString(),
    session_duration_seconds: (session.lastActive - session.createdAt) / 1000,
    message_count: messageCount,
    memory_summary: session.memorySummary,
    context_relevance_score: session.contextRelevanceScore,
    user_preferences: session.userPreferences,
    session_metadata: session.metadata,
    estimated_session_value: Math.min(messageCount * 0.1, MAX_SESSION_VALUE),
  };
}
