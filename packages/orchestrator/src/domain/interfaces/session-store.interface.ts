import type { SessionPatch, SessionRecord } from '@ventanilla/shared';

/**
 * Keyed store for session records. Implementations must treat `update` as a
 * field-level partial write and report whether the record existed.
 */
export interface SessionStore {
  create(record: SessionRecord): Promise<void>;
  get(sessionId: string): Promise<SessionRecord | null>;
  update(sessionId: string, patch: SessionPatch): Promise<boolean>;
  delete(sessionId: string): Promise<boolean>;
  findByUser(userId: string): Promise<SessionRecord[]>;
  /** Ids of sessions inactive since `lastActiveBefore` or whose TTL passed at `now`. */
  findStale(lastActiveBefore: number, now: number): Promise<string[]>;
  ping(): Promise<void>;
}
