/**
 * @file packages/orchestrator/src/infrastructure/repositories/postgres-session-store.ts
 * @description SessionStore backed by the `sessions` table.
 */

import { asc, eq, lt, lte, or, sql } from 'drizzle-orm';
import { SessionRecordSchema, type SessionPatch, type SessionRecord } from '@ventanilla/shared';
import type { SessionStore } from '../../domain/interfaces/session-store.interface.js';
import type { OrchestratorDatabase } from './database.js';
import { sessions, type SessionRow } from './schema.js';

/**
 * JSONB columns come back untyped from the driver; the record schema is the
 * only thing vouching for their shape.
 */
export function toRecord(row: SessionRow): SessionRecord {
  return SessionRecordSchema.parse(row);
}

export function isEmptyPatch(patch: SessionPatch): boolean {
  return Object.values(patch).every((value) => value === undefined);
}

export class PostgresSessionStore implements SessionStore {
  constructor(private database: OrchestratorDatabase) {}

  private get db() {
    return this.database.db;
  }

  async create(record: SessionRecord): Promise<void> {
    await this.db.insert(sessions).values(record);
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const rows = await this.db.select().from(sessions).where(eq(sessions.id, sessionId)).limit(1);
    const row = rows[0];
    return row ? toRecord(row) : null;
  }

  async update(sessionId: string, patch: SessionPatch): Promise<boolean> {
    if (isEmptyPatch(patch)) {
      return (await this.get(sessionId)) !== null;
    }
    const updated = await this.db
      .update(sessions)
      .set(patch)
      .where(eq(sessions.id, sessionId))
      .returning({ id: sessions.id });
    return updated.length > 0;
  }

  async delete(sessionId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(sessions)
      .where(eq(sessions.id, sessionId))
      .returning({ id: sessions.id });
    return deleted.length > 0;
  }

  async findByUser(userId: string): Promise<SessionRecord[]> {
    const rows = await this.db
      .select()
      .from(sessions)
      .where(eq(sessions.userId, userId))
      .orderBy(asc(sessions.createdAt));
    return rows.map(toRecord);
  }

  async findStale(lastActiveBefore: number, now: number): Promise<string[]> {
    const rows = await this.db
      .select({ id: sessions.id })
      .from(sessions)
      .where(or(lt(sessions.lastActive, lastActiveBefore), lte(sessions.expiresAt, now)));
    return rows.map((row) => row.id);
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }
}
