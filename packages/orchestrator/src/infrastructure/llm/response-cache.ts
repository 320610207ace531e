import { createHash } from 'node:crypto';

const DEFAULT_MAX_ENTRIES = 500;

/**
 * TTL cache for model completions keyed by a SHA-256 of the request content.
 * Insertion-ordered, so the oldest entry is evicted first when full.
 */
export class ResponseCache {
  private entries = new Map<string, { value: string; expiresAt: number }>();

  constructor(
    private ttlMs: number,
    private maxEntries = DEFAULT_MAX_ENTRIES,
    private now: () => number = () => Date.now(),
  ) {}

  static keyFor(...parts: string[]): string {
    const hash = createHash('sha256');
    for (const part of parts) hash.update(part).update('\u0000');
    return hash.digest('hex');
  }

  get(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: string): void {
    if (this.ttlMs <= 0) return;
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
