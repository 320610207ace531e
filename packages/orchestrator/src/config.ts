/**
 * @file packages/orchestrator/src/config.ts
 * @description Loads orchestrator configuration from `.env`, `ventanilla.config.yaml`
 *              and the process environment, in increasing order of precedence.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { config as loadDotenv } from 'dotenv';
import { OrchestratorConfigSchema, type OrchestratorConfig } from '@ventanilla/shared';
export type { OrchestratorConfig };

export const CONFIG_FILE_NAME = 'ventanilla.config.yaml';

type Env = Record<string, string | undefined>;
type PlainRecord = Record<string, unknown>;

let cachedConfig: OrchestratorConfig | null = null;

const parseBool = (value?: string): boolean | undefined => {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase().trim();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) return false;
  return undefined;
};

const parseNumber = (value?: string): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseList = (value?: string): string[] | undefined => {
  if (!value) return undefined;
  const items = value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
};

const isRecord = (value: unknown): value is PlainRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Drops undefined leaves so they never shadow file values. */
function compact(record: PlainRecord): PlainRecord {
  const out: PlainRecord = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined) continue;
    if (isRecord(value)) {
      const nested = compact(value);
      if (Object.keys(nested).length > 0) out[key] = nested;
      continue;
    }
    out[key] = value;
  }
  return out;
}

function deepMerge(base: PlainRecord, override: PlainRecord): PlainRecord {
  const out: PlainRecord = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key];
    out[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return out;
}

/**
 * Maps the recognised environment variables onto the config shape.
 */
export function configFromEnv(env: Env): PlainRecord {
  return compact({
    environment: env.ENVIRONMENT,
    host: env.HOST,
    port: parseNumber(env.PORT),
    databaseUrl: env.DATABASE_URL,
    corsOrigins: parseList(env.CORS_ORIGINS),
    session: {
      timeoutHours: parseNumber(env.SESSION_TIMEOUT_HOURS),
      maxSessionsPerUser: parseNumber(env.MAX_SESSIONS_PER_USER),
      ttlDays: parseNumber(env.SESSION_TTL_DAYS),
    },
    context: {
      maxHistory: parseNumber(env.MAX_MESSAGE_HISTORY),
    },
    classifier: {
      confidenceThreshold: parseNumber(env.CONFIDENCE_THRESHOLD),
    },
    llm: {
      model: env.LLM_MODEL,
      baseUrl: env.LLM_BASE_URL,
      apiKey: env.OPENAI_API_KEY,
      temperature: parseNumber(env.LLM_TEMPERATURE),
      maxTokens: parseNumber(env.LLM_MAX_TOKENS),
      timeoutSeconds: parseNumber(env.LLM_TIMEOUT),
    },
    agents: {
      endpoints: {
        tramites: env.TRAMITES_AGENT_URL,
        pqrsd: env.PQRSD_AGENT_URL,
        programas: env.PROGRAMAS_AGENT_URL,
        notificaciones: env.NOTIFICACIONES_AGENT_URL,
      },
      timeoutSeconds: parseNumber(env.AGENT_TIMEOUT),
    },
    rateLimit: {
      maxRequests: parseNumber(env.RATE_LIMIT_REQUESTS),
      windowSeconds: parseNumber(env.RATE_LIMIT_WINDOW),
      redisUrl: env.REDIS_URL,
    },
    monitoring: {
      enabled: parseBool(env.ENABLE_METRICS),
      retentionDays: parseNumber(env.METRICS_RETENTION_DAYS),
    },
  });
}

/**
 * Loads config.
 * @param projectRoot - Directory holding `.env` and the YAML file; defaults to cwd.
 */
export function loadConfig(projectRoot?: string, env: Env = process.env): OrchestratorConfig {
  if (cachedConfig) return cachedConfig;

  const root = projectRoot || process.cwd();

  const envPath = join(root, '.env');
  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  const configPath = join(root, CONFIG_FILE_NAME);
  let fileConfig: PlainRecord = {};
  if (existsSync(configPath)) {
    const parsed: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
    fileConfig = isRecord(parsed) ? parsed : {};
  }

  cachedConfig = OrchestratorConfigSchema.parse(deepMerge(fileConfig, configFromEnv(env)));
  return cachedConfig;
}

/** Forgets the cached config; the next `loadConfig` re-reads every source. */
export function resetConfigCache(): void {
  cachedConfig = null;
}
