/**
 * @file packages/orchestrator/src/infrastructure/rate-limit/redis-rate-limit-backend.ts
 * @description Sorted-set sliding window shared by every orchestrator replica.
 */

import { Redis } from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import type { RateLimitBackend } from '../../domain/interfaces/rate-limit-backend.interface.js';
import { errorMessage } from '../../domain/errors/app-error.js';
import type { Logger } from '../../logger.js';

/** The sorted-set commands the backend issues. */
export interface SortedSetClient {
  zremrangebyscore(key: string, min: number, max: number): Promise<unknown>;
  zcard(key: string): Promise<number>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  expire(key: string, seconds: number): Promise<unknown>;
  ping(): Promise<unknown>;
  quit(): Promise<unknown>;
}

export class RedisRateLimitBackend implements RateLimitBackend {
  readonly kind = 'redis';

  constructor(private client: SortedSetClient) {}

  /**
   * Opens a client that fails fast instead of queueing commands while
   * disconnected, so callers can fall back immediately.
   */
  static connect(url: string, logger: Logger): RedisRateLimitBackend {
    const client = new Redis(url, {
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      connectTimeout: 2_000,
    });
    client.on('error', (err: unknown) => {
      logger.warn('[RateLimiter] Redis connection error', {
        event: 'redis_error',
        error: errorMessage(err),
      });
    });
    return new RedisRateLimitBackend(client);
  }

  async removeOlderThan(key: string, cutoff: number): Promise<void> {
    await this.client.zremrangebyscore(key, 0, cutoff);
  }

  async count(key: string): Promise<number> {
    return this.client.zcard(key);
  }

  async add(key: string, timestamp: number): Promise<void> {
    // Members must be unique or same-millisecond requests collapse into one.
    await this.client.zadd(key, timestamp, `${timestamp}-${uuidv4()}`);
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    await this.client.expire(key, ttlSeconds);
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
