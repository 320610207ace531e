/**
 * @file packages/orchestrator/src/application/services/session-manager.ts
 * @description Session lifecycle: creation with per-user caps, ownership and
 *              inactivity validation, and the stale-session sweep.
 */

import { inject, singleton } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import {
  SESSION_ID_PREFIX,
  type SessionMetadata,
  type SessionRecord,
} from '@ventanilla/shared';
import { TOKENS } from '../../domain/interfaces/tokens.js';
import type { SessionStore } from '../../domain/interfaces/session-store.interface.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { Logger } from '../../logger.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export type SessionValidation =
  | { ok: true; session: SessionRecord }
  | { ok: false; reason: 'not_found' | 'unauthorized' | 'expired' };

@singleton()
export class SessionManager {
  private readonly timeoutMs: number;
  private readonly ttlMs: number;
  private readonly maxSessionsPerUser: number;
  private readonly environment: string;

  constructor(
    @inject(TOKENS.SessionStore) private store: SessionStore,
    @inject(ConfigService) config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {
    const session = config.get('session');
    this.timeoutMs = session.timeoutHours * HOUR_MS;
    this.ttlMs = session.ttlDays * DAY_MS;
    this.maxSessionsPerUser = session.maxSessionsPerUser;
    this.environment = config.get('environment');
  }

  /**
   * Opens a session for the user, evicting their oldest one when the
   * per-user cap is already reached.
   * @returns The new session id.
   */
  async create(userId: string, chatId: string, metadata: SessionMetadata = {}): Promise<string> {
    const owned = await this.store.findByUser(userId);
    if (owned.length >= this.maxSessionsPerUser) {
      const oldest = owned.reduce((a, b) => (b.createdAt < a.createdAt ? b : a));
      await this.store.delete(oldest.id);
      this.logger.info('[SessionManager] Closed oldest session for user at cap', {
        event: 'session_evicted',
        sessionId: oldest.id,
        userId,
      });
    }

    const now = Date.now();
    const id = `${SESSION_ID_PREFIX}${uuidv4().replace(/-/g, '')}`;
    await this.store.create({
      id,
      userId,
      chatId,
      createdAt: now,
      lastActive: now,
      messages: [],
      memorySummary: '',
      userPreferences: {},
      contextRelevanceScore: 0,
      expiresAt: now + this.ttlMs,
      metadata: { environment: this.environment, ...metadata },
    });

    this.logger.info('[SessionManager] Session created', { event: 'session_created', sessionId: id, userId });
    return id;
  }

  /**
   * Checks existence, ownership, inactivity and the absolute TTL. A valid
   * session has its `lastActive` refreshed; an expired one is deleted. Store
   * failures propagate.
   */
  async validate(sessionId: string, userId: string): Promise<SessionValidation> {
    const session = await this.store.get(sessionId);
    if (!session) return { ok: false, reason: 'not_found' };

    if (session.userId !== userId) {
      this.logger.warn('[SessionManager] Session accessed by non-owner', {
        event: 'session_unauthorized',
        sessionId,
      });
      return { ok: false, reason: 'unauthorized' };
    }

    const now = Date.now();
    if (now - session.lastActive > this.timeoutMs || now >= session.expiresAt) {
      await this.store.delete(sessionId);
      this.logger.info('[SessionManager] Session expired', { event: 'session_expired', sessionId });
      return { ok: false, reason: 'expired' };
    }

    await this.store.update(sessionId, { lastActive: now });
    return { ok: true, session: { ...session, lastActive: now } };
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    return this.store.get(sessionId);
  }

  /**
   * Deletes sessions inactive past the timeout or past their TTL.
   * @returns Number of sessions deleted.
   */
  async sweep(): Promise<number> {
    const now = Date.now();
    const stale = await this.store.findStale(now - this.timeoutMs, now);

    let deleted = 0;
    for (const id of stale) {
      if (await this.store.delete(id)) deleted++;
    }

    if (deleted > 0) {
      this.logger.info(`[SessionManager] Swept ${deleted} expired sessions`, {
        event: 'sessions_swept',
        count: deleted,
      });
    }
    return deleted;
  }
}
