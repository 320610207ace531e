/**
 * @file packages/orchestrator/src/domain/logic/agent-router.ts
 * @description Dispatches a classified message to the agent that owns its intent.
 */

import { inject, singleton } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import {
  agentKindFor,
  serializeAgentRequest,
  type AgentConversationContext,
  type AgentKind,
} from '@ventanilla/shared';
import { TOKENS } from '../interfaces/tokens.js';
import type { HttpFetch } from '../interfaces/http-fetch.interface.js';
import { errorMessage } from '../errors/app-error.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { MonitoringManager } from '../../application/services/monitoring-manager.js';
import type { ConversationContext } from '../../application/services/context-manager.js';
import { Logger } from '../../logger.js';

export type AgentFailure = 'NoAgentAvailable' | 'AgentTimeout' | 'AgentUnavailable' | 'RoutingError';

const FAILURES: Record<AgentFailure, { error: string; metric: string }> = {
  NoAgentAvailable: { error: 'No agent available for intent', metric: 'agent_routing_error' },
  AgentTimeout: { error: 'Agent timeout', metric: 'agent_timeout' },
  AgentUnavailable: { error: 'Agent unavailable', metric: 'agent_request_error' },
  RoutingError: { error: 'Routing error', metric: 'agent_routing_error' },
};

export type AgentRouteResult =
  | { ok: true; agent: AgentKind; payload: Record<string, unknown> }
  | { ok: false; failure: AgentFailure; body: { error: string; intent: string } };

class AgentHttpError extends Error {
  constructor(readonly status: number) {
    super(`Agent responded with HTTP ${status}`);
    this.name = 'AgentHttpError';
  }
}

class AgentPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentPayloadError';
  }
}

/**
 * Maps a dispatch error onto its failure kind. Aborts from the request
 * timeout surface as `TimeoutError` (or `AbortError` on older runtimes);
 * fetch reports connection failures as `TypeError`.
 */
export function classifyDispatchError(err: unknown): AgentFailure {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') return 'AgentTimeout';
    if (err instanceof AgentHttpError || err instanceof TypeError) return 'AgentUnavailable';
  }
  return 'RoutingError';
}

export function toAgentContext(context: ConversationContext): AgentConversationContext {
  return {
    recent_messages: context.recentMessages,
    memory_summary: context.memorySummary,
    user_preferences: context.userPreferences,
    context_relevance_score: context.contextRelevanceScore,
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

@singleton()
export class AgentRouter {
  private readonly endpoints: Record<AgentKind, string>;
  private readonly timeoutMs: number;

  constructor(
    @inject(TOKENS.HttpFetch) private fetch: HttpFetch,
    @inject(MonitoringManager) private monitoring: MonitoringManager,
    @inject(ConfigService) config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {
    const agents = config.get('agents');
    this.endpoints = agents.endpoints;
    this.timeoutMs = agents.timeoutSeconds * 1000;
  }

  endpointFor(kind: AgentKind): string {
    return this.endpoints[kind].replace(/\/+$/, '');
  }

  /**
   * Sends one request to the owning agent. No retries; every failure is
   * returned in-band.
   */
  async dispatch(
    intent: string,
    message: string,
    context: ConversationContext,
  ): Promise<AgentRouteResult> {
    const kind = agentKindFor(intent);
    if (!kind) {
      this.logger.warn(`[AgentRouter] No agent for intent ${intent}`, {
        event: 'agent_routing_error',
        intent,
        sessionId: context.sessionId,
      });
      return this.fail('NoAgentAvailable', intent, { intent });
    }

    const agentUrl = this.endpointFor(kind);
    const requestId = uuidv4();
    const started = Date.now();

    try {
      const response = await this.fetch(`${agentUrl}/process`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Service-Source': 'orchestrator',
          'X-Request-ID': requestId,
        },
        body: serializeAgentRequest({
          user_message: message,
          conversation_context: toAgentContext(context),
          intent,
          timestamp: new Date().toISOString(),
          session_id: context.sessionId,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) throw new AgentHttpError(response.status);

      const payload: unknown = await response.json();
      if (!isRecord(payload)) throw new AgentPayloadError('Agent response is not a JSON object');

      const seconds = (Date.now() - started) / 1000;
      this.monitoring.record('agent_response_time', seconds, { intent, agent_url: agentUrl });
      this.logger.info(`[AgentRouter] ${kind} answered in ${seconds.toFixed(3)}s`, {
        event: 'agent_response',
        intent,
        agent: kind,
        requestId,
        sessionId: context.sessionId,
      });
      return { ok: true, agent: kind, payload };
    } catch (err) {
      const failure = classifyDispatchError(err);
      this.logger.error(`[AgentRouter] ${kind} request failed: ${FAILURES[failure].error}`, {
        event: FAILURES[failure].metric,
        intent,
        agent: kind,
        requestId,
        sessionId: context.sessionId,
        error: errorMessage(err),
      });
      return this.fail(failure, intent, { intent, agent_url: agentUrl });
    }
  }

  private fail(
    failure: AgentFailure,
    intent: string,
    tags: Record<string, string>,
  ): AgentRouteResult {
    const { error, metric } = FAILURES[failure];
    this.monitoring.record(metric, 1, tags);
    return { ok: false, failure, body: { error, intent } };
  }
}
