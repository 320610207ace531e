/**
 * @file packages/orchestrator/src/infrastructure/repositories/postgres-telemetry-store.ts
 * @description Durable metric and alert sink on the `metrics` and `alerts` tables.
 */

import { lt } from 'drizzle-orm';
import type { Alert, Metric } from '@ventanilla/shared';
import type { AlertSink, MetricSink } from '../../domain/interfaces/telemetry-sink.interface.js';
import type { OrchestratorDatabase } from './database.js';
import { alerts, metrics } from './schema.js';
import { RetentionPolicy } from './retention-policy.js';

export class PostgresTelemetryStore implements MetricSink, AlertSink {
  private retention: RetentionPolicy;

  constructor(
    private database: OrchestratorDatabase,
    retentionDays: number,
  ) {
    this.retention = new RetentionPolicy(retentionDays);
  }

  private get db() {
    return this.database.db;
  }

  async record(metric: Metric): Promise<void> {
    await this.db.insert(metrics).values({
      name: metric.name,
      value: metric.value,
      tags: metric.tags,
      createdAt: metric.timestamp,
    });
    await this.afterWrite(metric.timestamp);
  }

  async alert(alert: Alert): Promise<void> {
    await this.db.insert(alerts).values({
      alertType: alert.alertType,
      message: alert.message,
      service: alert.service,
      createdAt: alert.timestamp,
    });
    await this.afterWrite(alert.timestamp);
  }

  /**
   * Deletes metrics and alerts older than the retention period.
   * @returns Number of rows removed.
   */
  async purgeExpired(now: number): Promise<number> {
    const cutoff = this.retention.cutoff(now);
    const purgedMetrics = await this.db
      .delete(metrics)
      .where(lt(metrics.createdAt, cutoff))
      .returning({ id: metrics.id });
    const purgedAlerts = await this.db
      .delete(alerts)
      .where(lt(alerts.createdAt, cutoff))
      .returning({ id: alerts.id });
    return purgedMetrics.length + purgedAlerts.length;
  }

  private async afterWrite(now: number): Promise<void> {
    if (this.retention.due()) await this.purgeExpired(now);
  }
}
