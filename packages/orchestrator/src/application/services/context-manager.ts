/**
 * @file packages/orchestrator/src/application/services/context-manager.ts
 * @description Loads the conversation window for a turn and persists it afterwards.
 */

import { inject, singleton } from 'tsyringe';
import {
  ContextSummarySchema,
  parseModelJson,
  type ContextSummary,
  type ConversationMessage,
  type MessageRole,
  type SessionRecord,
} from '@ventanilla/shared';
import { TOKENS } from '../../domain/interfaces/tokens.js';
import type { SessionStore } from '../../domain/interfaces/session-store.interface.js';
import type { TextGenerator } from '../../domain/interfaces/text-generator.interface.js';
import { SessionNotFoundError, errorMessage } from '../../domain/errors/app-error.js';
import { SYSTEM_PROMPT, summarizationPrompt } from '../../domain/logic/prompts.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { Logger } from '../../logger.js';

export interface ConversationContext {
  sessionId: string;
  /** Stored history plus the incoming user message, oldest first. */
  recentMessages: ConversationMessage[];
  memorySummary: string;
  userPreferences: Record<string, unknown>;
  contextRelevanceScore: number;
  /**
   * Set when the stored history could not be read: the window holds only the
   * incoming message and must not replace what the store has.
   */
  degraded: boolean;
}

export interface ContextUpdate {
  summary?: string;
  userPreferences?: Record<string, unknown>;
  relevanceScore?: number;
}

export function message(role: MessageRole, text: string): ConversationMessage {
  return { role, text, timestamp: new Date().toISOString() };
}

type StoredContext = Pick<
  SessionRecord,
  'id' | 'messages' | 'memorySummary' | 'userPreferences' | 'contextRelevanceScore'
>;

@singleton()
export class ContextManager {
  private readonly maxHistory: number;
  private readonly summarizeOverflow: boolean;

  constructor(
    @inject(TOKENS.SessionStore) private store: SessionStore,
    @inject(TOKENS.TextGenerator) private generator: TextGenerator,
    @inject(ConfigService) config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {
    const context = config.get('context');
    this.maxHistory = context.maxHistory;
    this.summarizeOverflow = context.summarizeOverflow;
  }

  /**
   * Returns the stored window with the incoming message appended. Nothing is
   * persisted here.
   */
  async load(sessionId: string, incomingText: string): Promise<ConversationContext> {
    const incoming = message('user', incomingText);
    try {
      const session = await this.store.get(sessionId);
      if (!session) {
        this.logger.warn('[ContextManager] No session to load context from', {
          event: 'context_missing',
          sessionId,
        });
        return degradedContext(sessionId, incoming);
      }
      return this.windowOf(session, [incoming]);
    } catch (err) {
      this.logger.error('[ContextManager] Failed to load context', {
        event: 'context_load_error',
        sessionId,
        error: errorMessage(err),
      });
      return degradedContext(sessionId, incoming);
    }
  }

  /**
   * Writes the newest `maxHistory` messages and bumps `lastActive`.
   * Last writer wins when turns of one session overlap.
   */
  async commit(
    sessionId: string,
    messages: readonly ConversationMessage[],
    update: ContextUpdate = {},
  ): Promise<void> {
    const written = await this.store.update(sessionId, {
      messages: messages.slice(-this.maxHistory),
      lastActive: Date.now(),
      memorySummary: update.summary,
      userPreferences: update.userPreferences,
      contextRelevanceScore: update.relevanceScore,
    });
    if (!written) throw new SessionNotFoundError();
  }

  /**
   * Commits a finished turn: the loaded window plus the reply, with any
   * messages pushed out of the window folded into the memory summary first.
   */
  async commitTurn(context: ConversationContext, replyText: string | null): Promise<void> {
    const base = context.degraded ? await this.reload(context) : context;
    const messages = replyText === null
      ? base.recentMessages
      : [...base.recentMessages, message('agent', replyText)];

    const overflow = this.overflowOf(messages);
    let update: ContextUpdate = {};
    if (overflow.length > 0 && this.summarizeOverflow) {
      const summary = await this.summarize(base.memorySummary, overflow);
      if (summary) {
        update = {
          summary: summary.summary,
          userPreferences: { ...base.userPreferences, ...summary.user_preferences },
          relevanceScore: summary.context_relevance_score,
        };
      }
    }

    await this.commit(base.sessionId, messages, update);
  }

  /**
   * Reads the stored history again for a context loaded without it, keeping
   * the turn's own messages at the end.
   */
  private async reload(context: ConversationContext): Promise<ConversationContext> {
    const session = await this.store.get(context.sessionId);
    if (!session) throw new SessionNotFoundError();
    return this.windowOf(session, context.recentMessages);
  }

  private windowOf(
    session: StoredContext,
    turn: readonly ConversationMessage[],
  ): ConversationContext {
    return {
      sessionId: session.id,
      recentMessages: [...session.messages.slice(-this.maxHistory), ...turn],
      memorySummary: session.memorySummary,
      userPreferences: session.userPreferences,
      contextRelevanceScore: session.contextRelevanceScore,
      degraded: false,
    };
  }

  overflowOf(messages: readonly ConversationMessage[]): ConversationMessage[] {
    return messages.slice(0, Math.max(0, messages.length - this.maxHistory));
  }

  /**
   * Folds `overflow` into the running summary. Returns null on any failure.
   */
  async summarize(
    previousSummary: string,
    overflow: readonly ConversationMessage[],
  ): Promise<ContextSummary | null> {
    try {
      const raw = await this.generator.generate(
        summarizationPrompt(previousSummary, overflow),
        SYSTEM_PROMPT,
      );
      return ContextSummarySchema.parse(parseModelJson(raw));
    } catch (err) {
      this.logger.warn('[ContextManager] Summarisation failed, keeping previous summary', {
        event: 'context_summary_error',
        error: errorMessage(err),
      });
      return null;
    }
  }
}

function degradedContext(sessionId: string, incoming: ConversationMessage): ConversationContext {
  return {
    sessionId,
    recentMessages: [incoming],
    memorySummary: '',
    userPreferences: {},
    contextRelevanceScore: 0,
    degraded: true,
  };
}
