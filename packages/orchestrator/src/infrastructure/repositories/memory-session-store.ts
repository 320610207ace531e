/**
 * @file packages/orchestrator/src/infrastructure/repositories/memory-session-store.ts
 * @description Process-local SessionStore, used when no database URL is configured.
 */

import type { SessionPatch, SessionRecord } from '@ventanilla/shared';
import type { SessionStore } from '../../domain/interfaces/session-store.interface.js';

/**
 * Records are cloned on the way in and out so callers never share state
 * with the store, matching what a networked store returns.
 */
export class MemorySessionStore implements SessionStore {
  private records = new Map<string, SessionRecord>();

  async create(record: SessionRecord): Promise<void> {
    if (this.records.has(record.id)) {
      throw new Error(`Session already exists: ${record.id}`);
    }
    this.records.set(record.id, structuredClone(record));
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const record = this.records.get(sessionId);
    return record ? structuredClone(record) : null;
  }

  async update(sessionId: string, patch: SessionPatch): Promise<boolean> {
    const record = this.records.get(sessionId);
    if (!record) return false;

    const next: SessionRecord = { ...record };
    if (patch.lastActive !== undefined) next.lastActive = patch.lastActive;
    if (patch.messages !== undefined) next.messages = structuredClone(patch.messages);
    if (patch.memorySummary !== undefined) next.memorySummary = patch.memorySummary;
    if (patch.userPreferences !== undefined) {
      next.userPreferences = structuredClone(patch.userPreferences);
    }
    if (patch.contextRelevanceScore !== undefined) {
      next.contextRelevanceScore = patch.contextRelevanceScore;
    }
    this.records.set(sessionId, next);
    return true;
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.records.delete(sessionId);
  }

  async findByUser(userId: string): Promise<SessionRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.userId === userId)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((record) => structuredClone(record));
  }

  async findStale(lastActiveBefore: number, now: number): Promise<string[]> {
    return [...this.records.values()]
      .filter((record) => record.lastActive < lastActiveBefore || record.expiresAt <= now)
      .map((record) => record.id);
  }

  async ping(): Promise<void> {}

  get size(): number {
    return this.records.size;
  }
}
