/**
 * @file packages/shared/src/constants.ts
 * @description Version and default values shared across the workspace.
 */

// ─── Ventanilla Constants ─────────────────────────────────────

export const VENTANILLA_VERSION = '0.1.0';

export const SERVICE_NAME = 'ventanilla-orchestrator';

export const DEFAULT_PORTS = {
  orchestrator: 8081,
  tramites: 8082,
  pqrsd: 8083,
  programas: 8084,
  notificaciones: 8085,
} as const;

export const ALERT_THRESHOLDS = {
  errorRate: 0.05,
  responseTimeSeconds: 5,
  cpuPercent: 80,
  memoryPercent: 80,
} as const;

export const SENSITIVE_FIELD_WORDS = [
  'password',
  'token',
  'secret',
  'key',
  'authorization',
  'jwt',
] as const;

export const SESSION_ID_PREFIX = 'session_';
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;
export const DEFAULT_AGENT_TIMEOUT_SECONDS = 30;
