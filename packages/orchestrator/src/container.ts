/**
 * @file packages/orchestrator/src/container.ts
 * @description Registers the configuration and the interface-backed
 *              collaborators; services and controllers self-register as
 *              `@singleton()`.
 */

import 'reflect-metadata';
import { container, type DependencyContainer } from 'tsyringe';
import type { OrchestratorConfig } from '@ventanilla/shared';
import { Logger } from './logger.js';
import { TOKENS } from './domain/interfaces/tokens.js';
import type { SessionStore } from './domain/interfaces/session-store.interface.js';
import type { RateLimitBackends } from './domain/interfaces/rate-limit-backend.interface.js';
import type { TextGenerator } from './domain/interfaces/text-generator.interface.js';
import type { AlertSink, MetricSink } from './domain/interfaces/telemetry-sink.interface.js';
import type { HostProbe } from './domain/interfaces/host-probe.interface.js';
import type { HttpFetch } from './domain/interfaces/http-fetch.interface.js';
import { OrchestratorDatabase } from './infrastructure/repositories/database.js';
import { PostgresSessionStore } from './infrastructure/repositories/postgres-session-store.js';
import { PostgresTelemetryStore } from './infrastructure/repositories/postgres-telemetry-store.js';
import { MemorySessionStore } from './infrastructure/repositories/memory-session-store.js';
import { MemoryTelemetryStore } from './infrastructure/repositories/memory-telemetry-store.js';
import { MemoryRateLimitBackend } from './infrastructure/rate-limit/memory-rate-limit-backend.js';
import { RedisRateLimitBackend } from './infrastructure/rate-limit/redis-rate-limit-backend.js';
import { OpenAITextGenerator } from './infrastructure/llm/openai-text-generator.js';
import { HostResourceProbe } from './infrastructure/sensors/host-resource-probe.js';

export interface Collaborators {
  logger: Logger;
  sessionStore: SessionStore;
  rateLimitBackends: RateLimitBackends;
  textGenerator: TextGenerator;
  metricSink: MetricSink;
  alertSink: AlertSink;
  hostProbe: HostProbe;
  httpFetch: HttpFetch;
}

export interface ContainerHandle {
  container: DependencyContainer;
  /** Creates the database tables when a database is in use. */
  initialize(): Promise<void>;
  /** Closes the connections opened for default collaborators. */
  dispose(): Promise<void>;
}

/**
 * Registers everything the orchestrator resolves. Collaborators missing from
 * `overrides` get their default implementation: PostgreSQL when
 * `databaseUrl` is set, process memory otherwise. The database is opened only
 * when a store or sink needs it.
 */
export function setupContainer(
  config: OrchestratorConfig,
  overrides: Partial<Collaborators> = {},
): ContainerHandle {
  const disposers: Array<() => Promise<void> | void> = [];
  const logger = overrides.logger ?? new Logger();

  let database: OrchestratorDatabase | null = null;
  const openDatabase = (connectionString: string): OrchestratorDatabase => {
    if (!database) {
      const opened = OrchestratorDatabase.connect(connectionString);
      disposers.push(() => opened.close());
      database = opened;
    }
    return database;
  };

  const { databaseUrl } = config;
  let telemetry: (MetricSink & AlertSink) | null = null;
  const telemetryStore = (): MetricSink & AlertSink => {
    telemetry ??= databaseUrl
      ? new PostgresTelemetryStore(openDatabase(databaseUrl), config.monitoring.retentionDays)
      : new MemoryTelemetryStore(config.monitoring.retentionDays);
    return telemetry;
  };
  const sessionStore = (): SessionStore =>
    databaseUrl ? new PostgresSessionStore(openDatabase(databaseUrl)) : new MemorySessionStore();

  const rateLimitBackends = overrides.rateLimitBackends ?? defaultRateLimitBackends(config, logger, disposers);

  container.register(TOKENS.Config, { useValue: config });
  container.register(Logger, { useValue: logger });
  container.register<SessionStore>(TOKENS.SessionStore, {
    useValue: overrides.sessionStore ?? sessionStore(),
  });
  container.register<RateLimitBackends>(TOKENS.RateLimitBackends, { useValue: rateLimitBackends });
  container.register<TextGenerator>(TOKENS.TextGenerator, {
    useValue: overrides.textGenerator ?? OpenAITextGenerator.fromConfig(config.llm),
  });
  container.register<MetricSink>(TOKENS.MetricSink, {
    useValue: overrides.metricSink ?? telemetryStore(),
  });
  container.register<AlertSink>(TOKENS.AlertSink, {
    useValue: overrides.alertSink ?? telemetryStore(),
  });
  container.register<HostProbe>(TOKENS.HostProbe, {
    useValue: overrides.hostProbe ?? new HostResourceProbe(),
  });
  container.register<HttpFetch>(TOKENS.HttpFetch, {
    useValue: overrides.httpFetch ?? ((input, init) => fetch(input, init)),
  });

  return {
    container,
    async initialize() {
      if (database) await database.migrate();
    },
    async dispose() {
      for (const dispose of disposers.reverse()) {
        await dispose();
      }
      container.clearInstances();
    },
  };
}

function defaultRateLimitBackends(
  config: OrchestratorConfig,
  logger: Logger,
  disposers: Array<() => Promise<void> | void>,
): RateLimitBackends {
  const local = new MemoryRateLimitBackend();
  const { redisUrl } = config.rateLimit;
  if (!redisUrl) return { remote: null, local };

  const remote = RedisRateLimitBackend.connect(redisUrl, logger);
  disposers.push(() => remote.close());
  return { remote, local };
}

export { container };
