import type { RateLimitBackend } from '../../domain/interfaces/rate-limit-backend.interface.js';

const EVICTION_EVERY_N_ADDS = 1_000;

/**
 * In-process sliding-window storage. Per-instance only: counts are not shared
 * between replicas.
 */
export class MemoryRateLimitBackend implements RateLimitBackend {
  readonly kind = 'memory';
  private windows = new Map<string, number[]>();
  private expiries = new Map<string, number>();
  private addsSinceEviction = 0;

  constructor(private now: () => number = () => Date.now()) {}

  async removeOlderThan(key: string, cutoff: number): Promise<void> {
    const timestamps = this.live(key);
    if (!timestamps) return;
    this.windows.set(
      key,
      timestamps.filter((ts) => ts > cutoff),
    );
  }

  async count(key: string): Promise<number> {
    return this.live(key)?.length ?? 0;
  }

  async add(key: string, timestamp: number): Promise<void> {
    const timestamps = this.live(key) ?? [];
    timestamps.push(timestamp);
    this.windows.set(key, timestamps);

    if (++this.addsSinceEviction >= EVICTION_EVERY_N_ADDS) {
      this.addsSinceEviction = 0;
      this.evictExpired();
    }
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    if (!this.windows.has(key)) return;
    this.expiries.set(key, this.now() + ttlSeconds * 1000);
  }

  async ping(): Promise<void> {}

  /** Number of client keys currently held. */
  get size(): number {
    return this.windows.size;
  }

  private live(key: string): number[] | undefined {
    const expiresAt = this.expiries.get(key);
    if (expiresAt !== undefined && expiresAt <= this.now()) {
      this.windows.delete(key);
      this.expiries.delete(key);
      return undefined;
    }
    return this.windows.get(key);
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [key, expiresAt] of this.expiries) {
      if (expiresAt <= now) {
        this.windows.delete(key);
        this.expiries.delete(key);
      }
    }
  }
}
