/**
 * @file packages/orchestrator/src/infrastructure/repositories/schema.ts
 * @description Drizzle table definitions for sessions and telemetry.
 */

import {
  pgTable,
  serial,
  text,
  bigint,
  doublePrecision,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';
import type { ConversationMessage, SessionMetadata } from '@ventanilla/shared';

// ─── Sessions ─────────────────────────────────────────────────

export const sessions = pgTable(
  'sessions',
  {
    id: text('id').primaryKey(),
    userId: text('user_id').notNull(),
    chatId: text('chat_id').notNull(),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    lastActive: bigint('last_active', { mode: 'number' }).notNull(),
    messages: jsonb('messages').notNull().$type<ConversationMessage[]>().default([]),
    memorySummary: text('memory_summary').notNull().default(''),
    userPreferences: jsonb('user_preferences')
      .notNull()
      .$type<Record<string, unknown>>()
      .default({}),
    contextRelevanceScore: doublePrecision('context_relevance_score').notNull().default(0),
    expiresAt: bigint('expires_at', { mode: 'number' }).notNull(),
    metadata: jsonb('metadata').notNull().$type<SessionMetadata>().default({}),
  },
  (table) => [
    index('sessions_user_idx').on(table.userId),
    index('sessions_last_active_idx').on(table.lastActive),
  ],
);

export type SessionRow = typeof sessions.$inferSelect;

// ─── Telemetry ────────────────────────────────────────────────

export const metrics = pgTable(
  'metrics',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    value: doublePrecision('value').notNull(),
    tags: jsonb('tags').notNull().$type<Record<string, string>>().default({}),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => [index('metrics_name_created_idx').on(table.name, table.createdAt)],
);

export const alerts = pgTable(
  'alerts',
  {
    id: serial('id').primaryKey(),
    alertType: text('alert_type').notNull(),
    message: text('message').notNull(),
    service: text('service').notNull(),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => [index('alerts_created_idx').on(table.createdAt)],
);
