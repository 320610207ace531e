const DAY_MS = 24 * 60 * 60 * 1000;
const PURGE_EVERY_N_WRITES = 500;

/**
 * Retention window for telemetry, purged every few hundred writes rather
 * than on a timer.
 */
export class RetentionPolicy {
  private writesSincePurge = 0;

  constructor(
    private retentionDays: number,
    private purgeEvery: number = PURGE_EVERY_N_WRITES,
  ) {}

  cutoff(now: number): number {
    return now - this.retentionDays * DAY_MS;
  }

  /** Counts a write; true once every `purgeEvery` writes. */
  due(): boolean {
    if (++this.writesSincePurge < this.purgeEvery) return false;
    this.writesSincePurge = 0;
    return true;
  }
}
