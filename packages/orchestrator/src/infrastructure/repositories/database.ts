/**
 * @file packages/orchestrator/src/infrastructure/repositories/database.ts
 * @description PostgreSQL connection and table bootstrap for sessions and telemetry.
 */

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export type OrchestratorDb = PostgresJsDatabase<typeof schema>;

/**
 * Owns the postgres.js client. The client connects lazily, so constructing
 * the database never touches the network; `migrate` is the first round trip.
 */
export class OrchestratorDatabase {
  readonly db: OrchestratorDb;

  private constructor(private client: ReturnType<typeof postgres>) {
    this.db = drizzle(client, { schema });
  }

  static connect(connectionString: string): OrchestratorDatabase {
    return new OrchestratorDatabase(postgres(connectionString, { max: 10 }));
  }

  /**
   * Creates the tables if they don't exist.
   */
  async migrate(): Promise<void> {
    await this.client.unsafe(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        chat_id TEXT NOT NULL,
        created_at BIGINT NOT NULL,
        last_active BIGINT NOT NULL,
        messages JSONB NOT NULL DEFAULT '[]',
        memory_summary TEXT NOT NULL DEFAULT '',
        user_preferences JSONB NOT NULL DEFAULT '{}',
        context_relevance_score DOUBLE PRECISION NOT NULL DEFAULT 0,
        expires_at BIGINT NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'
      );

      CREATE INDEX IF NOT EXISTS sessions_user_idx ON sessions(user_id);
      CREATE INDEX IF NOT EXISTS sessions_last_active_idx ON sessions(last_active);

      CREATE TABLE IF NOT EXISTS metrics (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL,
        value DOUBLE PRECISION NOT NULL,
        tags JSONB NOT NULL DEFAULT '{}',
        created_at BIGINT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS metrics_name_created_idx ON metrics(name, created_at);

      CREATE TABLE IF NOT EXISTS alerts (
        id SERIAL PRIMARY KEY,
        alert_type TEXT NOT NULL,
        message TEXT NOT NULL,
        service TEXT NOT NULL,
        created_at BIGINT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS alerts_created_idx ON alerts(created_at);
    `);
  }

  async close(): Promise<void> {
    await this.client.end({ timeout: 5 });
  }
}
