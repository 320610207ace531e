import { describe, it, expect } from 'vitest';
import { MemoryRateLimitBackend } from './memory-rate-limit-backend.js';

describe('MemoryRateLimitBackend', () => {
  it('removes timestamps at or before the cutoff', async () => {
    const backend = new MemoryRateLimitBackend(() => 0);
    await backend.add('k', 100);
    await backend.add('k', 200);
    await backend.add('k', 300);

    await backend.removeOlderThan('k', 200);

    expect(await backend.count('k')).toBe(1);
  });

  it('forgets a key once its expiry passes', async () => {
    let now = 1_000;
    const backend = new MemoryRateLimitBackend(() => now);
    await backend.add('k', 1_000);
    await backend.expire('k', 5);

    now = 5_999;
    expect(await backend.count('k')).toBe(1);
    now = 6_000;
    expect(await backend.count('k')).toBe(0);
    expect(backend.size).toBe(0);
  });

  it('ignores expiry for unknown keys', async () => {
    const backend = new MemoryRateLimitBackend(() => 0);
    await backend.expire('missing', 10);
    expect(await backend.count('missing')).toBe(0);
  });
});
