import 'reflect-metadata';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OrchestratorConfigSchema } from '@ventanilla/shared';
import { RateLimiter } from './rate-limiter.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { MemoryRateLimitBackend } from '../../infrastructure/rate-limit/memory-rate-limit-backend.js';
import type { RateLimitBackend } from '../interfaces/rate-limit-backend.interface.js';
import { Logger } from '../../logger.js';

const config = new ConfigService(
  OrchestratorConfigSchema.parse({ rateLimit: { maxRequests: 3, windowSeconds: 60 } }),
);

function failingBackend(): RateLimitBackend {
  const boom = vi.fn().mockRejectedValue(new Error('connection refused'));
  return {
    kind: 'redis',
    removeOlderThan: boom,
    count: boom,
    add: boom,
    expire: boom,
    ping: boom,
  };
}

describe('RateLimiter', () => {
  let logger: Logger;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T10:00:00Z'));
    logger = new Logger({ level: 'silent', pretty: false });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('admits up to the limit inside one window', async () => {
    const limiter = new RateLimiter(
      config,
      { remote: null, local: new MemoryRateLimitBackend() },
      logger,
    );

    const results: boolean[] = [];
    for (let i = 0; i < 5; i++) results.push(await limiter.admit('client-1'));

    expect(results).toEqual([true, true, true, false, false]);
    expect(await limiter.admit('client-2')).toBe(true);
  });

  it('admits again once the oldest requests leave the window', async () => {
    const limiter = new RateLimiter(
      config,
      { remote: null, local: new MemoryRateLimitBackend() },
      logger,
    );

    await limiter.admit('c');
    vi.advanceTimersByTime(30_000);
    await limiter.admit('c');
    await limiter.admit('c');
    expect(await limiter.admit('c')).toBe(false);

    // The first request is now exactly 60s old and drops out.
    vi.setSystemTime(new Date('2026-03-01T10:01:00Z'));
    expect(await limiter.admit('c')).toBe(true);
    expect(await limiter.admit('c')).toBe(false);
  });

  it('keys windows by client and sets the expiry to window + 60s', async () => {
    const local = new MemoryRateLimitBackend();
    const expire = vi.spyOn(local, 'expire');
    const add = vi.spyOn(local, 'add');
    const limiter = new RateLimiter(config, { remote: null, local }, logger);

    await limiter.admit('203.0.113.7');

    expect(add).toHaveBeenCalledWith(
      'rate_limit:orchestrator:203.0.113.7',
      Date.parse('2026-03-01T10:00:00Z'),
    );
    expect(expire).toHaveBeenCalledWith('rate_limit:orchestrator:203.0.113.7', 120);
  });

  it('falls back to the in-process window when the shared backend fails', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const local = new MemoryRateLimitBackend();
    const limiter = new RateLimiter(config, { remote: failingBackend(), local }, logger);

    expect(await limiter.admit('c')).toBe(true);
    expect(await local.count('rate_limit:orchestrator:c')).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      '[RateLimiter] Shared backend failed, using in-process window',
      { event: 'rate_limit_fallback', error: 'connection refused' },
    );
  });

  it('describes the configured storage', () => {
    const withRemote = new RateLimiter(
      config,
      { remote: failingBackend(), local: new MemoryRateLimitBackend() },
      logger,
    );
    const localOnly = new RateLimiter(
      config,
      { remote: null, local: new MemoryRateLimitBackend() },
      logger,
    );

    expect(withRemote.describe()).toEqual({ storage: 'redis', maxRequests: 3, windowSeconds: 60 });
    expect(localOnly.describe().storage).toBe('memory');
  });
});
