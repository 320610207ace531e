/**
 * @file packages/orchestrator/src/infrastructure/repositories/memory-telemetry-store.ts
 * @description Process-local metric and alert sink with the same retention as the durable one.
 */

import type { Alert, Metric } from '@ventanilla/shared';
import type { AlertSink, MetricSink } from '../../domain/interfaces/telemetry-sink.interface.js';
import { RetentionPolicy } from './retention-policy.js';

export class MemoryTelemetryStore implements MetricSink, AlertSink {
  private metrics: Metric[] = [];
  private alerts: Alert[] = [];
  private retention: RetentionPolicy;

  constructor(retentionDays: number, purgeEvery?: number) {
    this.retention = new RetentionPolicy(retentionDays, purgeEvery);
  }

  async record(metric: Metric): Promise<void> {
    this.metrics.push({ ...metric, tags: { ...metric.tags } });
    this.afterWrite(metric.timestamp);
  }

  async alert(alert: Alert): Promise<void> {
    this.alerts.push({ ...alert });
    this.afterWrite(alert.timestamp);
  }

  /**
   * Drops metrics and alerts older than the retention period.
   * @returns Number of entries removed.
   */
  purgeExpired(now: number): number {
    const cutoff = this.retention.cutoff(now);
    const before = this.metrics.length + this.alerts.length;
    this.metrics = this.metrics.filter((metric) => metric.timestamp >= cutoff);
    this.alerts = this.alerts.filter((alert) => alert.timestamp >= cutoff);
    return before - this.metrics.length - this.alerts.length;
  }

  storedMetrics(): readonly Metric[] {
    return this.metrics;
  }

  storedAlerts(): readonly Alert[] {
    return this.alerts;
  }

  private afterWrite(now: number): void {
    if (this.retention.due()) this.purgeExpired(now);
  }
}
