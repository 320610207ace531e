/**
 * Storage for sliding-window request timestamps, keyed per client.
 * Timestamps are epoch milliseconds.
 */
export interface RateLimitBackend {
  readonly kind: 'redis' | 'memory';
  /** Removes timestamps at or before `cutoff`. */
  removeOlderThan(key: string, cutoff: number): Promise<void>;
  count(key: string): Promise<number>;
  add(key: string, timestamp: number): Promise<void>;
  expire(key: string, ttlSeconds: number): Promise<void>;
  ping(): Promise<void>;
}

/**
 * The shared backend (if configured) and the in-process one it falls back to.
 */
export interface RateLimitBackends {
  remote: RateLimitBackend | null;
  local: RateLimitBackend;
}
