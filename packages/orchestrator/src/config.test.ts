import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CONFIG_FILE_NAME, configFromEnv, loadConfig, resetConfigCache } from './config.js';

describe('loadConfig', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'ventanilla-config-'));
    resetConfigCache();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    resetConfigCache();
  });

  it('falls back to defaults when nothing is configured', () => {
    const config = loadConfig(root, {});
    expect(config.port).toBe(8081);
    expect(config.session.timeoutHours).toBe(24);
    expect(config.rateLimit).toEqual({ maxRequests: 100, windowSeconds: 3600 });
    expect(config.agents.endpoints.pqrsd).toBe('http://localhost:8083');
  });

  it('reads the YAML file and lets environment variables override it', () => {
    writeFileSync(
      join(root, CONFIG_FILE_NAME),
      ['port: 9000', 'context:', '  maxHistory: 20', 'rateLimit:', '  maxRequests: 10'].join('\n'),
    );

    const config = loadConfig(root, { RATE_LIMIT_REQUESTS: '3', ENABLE_METRICS: 'off' });

    expect(config.port).toBe(9000);
    expect(config.context.maxHistory).toBe(20);
    expect(config.context.classifierWindow).toBe(5);
    expect(config.rateLimit.maxRequests).toBe(3);
    expect(config.monitoring.enabled).toBe(false);
  });

  it('caches the first result until reset', () => {
    const first = loadConfig(root, { PORT: '7000' });
    const second = loadConfig(root, { PORT: '7001' });
    expect(second).toBe(first);

    resetConfigCache();
    expect(loadConfig(root, { PORT: '7001' }).port).toBe(7001);
  });
});

describe('configFromEnv', () => {
  it('maps agent urls and ignores unparseable numbers', () => {
    expect(
      configFromEnv({
        TRAMITES_AGENT_URL: 'http://tramites:8082',
        PORT: 'not-a-number',
        CORS_ORIGINS: 'https://a.example, https://b.example',
      }),
    ).toEqual({
      corsOrigins: ['https://a.example', 'https://b.example'],
      agents: { endpoints: { tramites: 'http://tramites:8082' } },
    });
  });
});
