/**
 * @file packages/shared/src/types/config.ts
 * @description Orchestrator configuration schema. Every field has a default, so
 *              `OrchestratorConfigSchema.parse({})` yields a runnable development config.
 */

import { z } from 'zod';
import { DEFAULT_AGENT_TIMEOUT_SECONDS, DEFAULT_CONFIDENCE_THRESHOLD, DEFAULT_PORTS } from '../constants.js';

export const SessionConfigSchema = z.object({
  timeoutHours: z.number().positive().default(24),
  maxSessionsPerUser: z.number().int().min(1).default(5),
  ttlDays: z.number().positive().default(30),
  sweepSchedule: z.string().default('0 * * * *'),
});

export const ContextConfigSchema = z.object({
  maxHistory: z.number().int().min(1).default(50),
  classifierWindow: z.number().int().min(1).default(5),
  summarizeOverflow: z.boolean().default(true),
});

export const ClassifierConfigSchema = z.object({
  confidenceThreshold: z.number().min(0).max(1).default(DEFAULT_CONFIDENCE_THRESHOLD),
});

export const LlmConfigSchema = z.object({
  provider: z.string().default('openai'),
  model: z.string().default('gpt-4o-mini'),
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  temperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().positive().default(1024),
  timeoutSeconds: z.number().positive().default(30),
  cacheTtlSeconds: z.number().min(0).default(300),
});

export const AgentEndpointsSchema = z.object({
  tramites: z.string().default(`http://localhost:${DEFAULT_PORTS.tramites}`),
  pqrsd: z.string().default(`http://localhost:${DEFAULT_PORTS.pqrsd}`),
  programas: z.string().default(`http://localhost:${DEFAULT_PORTS.programas}`),
  notificaciones: z.string().default(`http://localhost:${DEFAULT_PORTS.notificaciones}`),
});

export const AgentsConfigSchema = z.object({
  endpoints: AgentEndpointsSchema.default({}),
  timeoutSeconds: z.number().positive().default(DEFAULT_AGENT_TIMEOUT_SECONDS),
});

export const RateLimitConfigSchema = z.object({
  maxRequests: z.number().int().min(1).default(100),
  windowSeconds: z.number().int().min(1).default(3600),
  redisUrl: z.string().optional(),
});

export const MonitoringConfigSchema = z.object({
  enabled: z.boolean().default(true),
  retentionDays: z.number().int().min(1).default(30),
  windowMinutes: z.number().positive().default(15),
  alertCooldownSeconds: z.number().min(0).default(300),
  maxSamplesPerMetric: z.number().int().min(1).default(10_000),
});

export const OrchestratorConfigSchema = z.object({
  environment: z.string().default('development'),
  host: z.string().default('0.0.0.0'),
  port: z.number().int().default(DEFAULT_PORTS.orchestrator),
  databaseUrl: z.string().optional(),
  corsOrigins: z.array(z.string()).default(['*']),
  session: SessionConfigSchema.default({}),
  context: ContextConfigSchema.default({}),
  classifier: ClassifierConfigSchema.default({}),
  llm: LlmConfigSchema.default({}),
  agents: AgentsConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  monitoring: MonitoringConfigSchema.default({}),
});
export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;
