/**
 * Injection tokens for collaborators registered behind interfaces.
 */
export const TOKENS = {
  Config: 'OrchestratorConfig',
  SessionStore: 'SessionStore',
  RateLimitBackends: 'RateLimitBackends',
  TextGenerator: 'TextGenerator',
  MetricSink: 'MetricSink',
  AlertSink: 'AlertSink',
  HostProbe: 'HostProbe',
  HttpFetch: 'HttpFetch',
} as const;
