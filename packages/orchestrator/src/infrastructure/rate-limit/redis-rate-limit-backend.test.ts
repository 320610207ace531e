import { describe, it, expect, vi } from 'vitest';
import { RedisRateLimitBackend, type SortedSetClient } from './redis-rate-limit-backend.js';

function fakeClient(): SortedSetClient {
  return {
    zremrangebyscore: vi.fn().mockResolvedValue(0),
    zcard: vi.fn().mockResolvedValue(4),
    zadd: vi.fn().mockResolvedValue(1),
    expire: vi.fn().mockResolvedValue(1),
    ping: vi.fn().mockResolvedValue('PONG'),
    quit: vi.fn().mockResolvedValue('OK'),
  };
}

describe('RedisRateLimitBackend', () => {
  it('maps the window operations onto sorted-set commands', async () => {
    const client = fakeClient();
    const backend = new RedisRateLimitBackend(client);

    await backend.removeOlderThan('rate_limit:orchestrator:c', 1_000);
    expect(await backend.count('rate_limit:orchestrator:c')).toBe(4);
    await backend.add('rate_limit:orchestrator:c', 2_000);
    await backend.expire('rate_limit:orchestrator:c', 3_660);

    expect(client.zremrangebyscore).toHaveBeenCalledWith('rate_limit:orchestrator:c', 0, 1_000);
    expect(client.zadd).toHaveBeenCalledWith(
      'rate_limit:orchestrator:c',
      2_000,
      expect.stringMatching(/^2000-[0-9a-f-]{36}$/),
    );
    expect(client.expire).toHaveBeenCalledWith('rate_limit:orchestrator:c', 3_660);
    expect(backend.kind).toBe('redis');
  });

  it('propagates command failures to the caller', async () => {
    const client = fakeClient();
    vi.mocked(client.zcard).mockRejectedValue(new Error('READONLY'));
    const backend = new RedisRateLimitBackend(client);

    await expect(backend.count('k')).rejects.toThrow('READONLY');
  });
});
