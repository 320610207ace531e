/**
 * @file packages/orchestrator/src/application/services/monitoring-manager.ts
 * @description In-process metric accumulator and threshold alerting.
 */

import { inject, singleton } from 'tsyringe';
import { ALERT_THRESHOLDS, type Alert, type Metric } from '@ventanilla/shared';
import { TOKENS } from '../../domain/interfaces/tokens.js';
import type { AlertSink, MetricSink } from '../../domain/interfaces/telemetry-sink.interface.js';
import type { HostProbe, HostUsage } from '../../domain/interfaces/host-probe.interface.js';
import { errorMessage } from '../../domain/errors/app-error.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { Logger } from '../../logger.js';

/** Metrics counted as failed requests when computing the error rate. */
export const FAILURE_METRICS = [
  'processing_error',
  'agent_timeout',
  'agent_request_error',
  'agent_routing_error',
] as const;

export const REQUEST_TIME_METRIC = 'request_processing_time';

const ALERT_BUFFER_SIZE = 200;
const ALERT_SERVICE = 'orchestrator';

export type AlertType =
  | 'high_error_rate'
  | 'high_response_time'
  | 'high_cpu_usage'
  | 'high_memory_usage';

export interface MetricSampleView {
  value: number;
  timestamp: string;
  tags: Record<string, string>;
}

export interface MonitoringSnapshot {
  timestamp: string;
  requestMetrics: Record<string, MetricSampleView[]>;
  systemMetrics: { cpuUsage: number; memoryUsage: number };
}

interface Sample {
  value: number;
  timestamp: number;
  tags: Record<string, string>;
}

@singleton()
export class MonitoringManager {
  private samples = new Map<string, Sample[]>();
  private alerts: Alert[] = [];
  private lastRaised = new Map<AlertType, number>();

  private readonly enabled: boolean;
  private readonly windowMs: number;
  private readonly cooldownMs: number;
  private readonly maxSamples: number;

  constructor(
    @inject(TOKENS.MetricSink) private metricSink: MetricSink,
    @inject(TOKENS.AlertSink) private alertSink: AlertSink,
    @inject(TOKENS.HostProbe) private host: HostProbe,
    @inject(ConfigService) config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {
    const monitoring = config.get('monitoring');
    this.enabled = monitoring.enabled;
    this.windowMs = monitoring.windowMinutes * 60_000;
    this.cooldownMs = monitoring.alertCooldownSeconds * 1000;
    this.maxSamples = monitoring.maxSamplesPerMetric;
  }

  get metricsEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Accumulates a sample and, when metrics are enabled, mirrors it to the
   * sink without waiting for delivery.
   */
  record(name: string, value: number, tags: Record<string, string> = {}): void {
    const metric: Metric = { name, value, timestamp: Date.now(), tags };

    const series = this.samples.get(name) ?? [];
    series.push({ value, timestamp: metric.timestamp, tags });
    if (series.length > this.maxSamples) series.splice(0, series.length - this.maxSamples);
    this.samples.set(name, series);

    if (!this.enabled) return;
    this.metricSink.record(metric).catch((err: unknown) => {
      this.logger.warn('[Monitoring] Failed to store metric', {
        event: 'metric_store_error',
        metric: name,
        error: errorMessage(err),
      });
    });
  }

  /**
   * Share of processed requests in the window that ended in a failure metric.
   */
  errorRate(now = Date.now()): number {
    const since = now - this.windowMs;
    const failures = FAILURE_METRICS.reduce((sum, name) => sum + this.sumSince(name, since), 0);
    const processed =
      this.countSince(REQUEST_TIME_METRIC, since) + this.countSince('processing_error', since);
    return processed > 0 ? failures / processed : 0;
  }

  /** Mean request processing time in seconds over the window. */
  averageResponseTime(now = Date.now()): number {
    const recent = this.since(REQUEST_TIME_METRIC, now - this.windowMs);
    if (recent.length === 0) return 0;
    return recent.reduce((sum, s) => sum + s.value, 0) / recent.length;
  }

  hostUsage(): HostUsage {
    return this.host.sample();
  }

  /**
   * Evaluates every threshold and raises the alerts that are not cooling down.
   * @returns Alerts raised by this call.
   */
  checkAlerts(): Alert[] {
    const now = Date.now();
    const raised: Alert[] = [];
    const raise = (type: AlertType, message: string) => {
      const alert = this.raise(type, message, now);
      if (alert) raised.push(alert);
    };

    const errorRate = this.errorRate(now);
    if (errorRate > ALERT_THRESHOLDS.errorRate) {
      raise('high_error_rate', `Error rate: ${(errorRate * 100).toFixed(2)}%`);
    }

    const responseTime = this.averageResponseTime(now);
    if (responseTime > ALERT_THRESHOLDS.responseTimeSeconds) {
      raise('high_response_time', `Avg response time: ${responseTime.toFixed(2)}s`);
    }

    const { cpuPercent, memoryPercent } = this.host.sample();
    if (cpuPercent > ALERT_THRESHOLDS.cpuPercent) {
      raise('high_cpu_usage', `CPU usage: ${cpuPercent.toFixed(1)}%`);
    }
    if (memoryPercent > ALERT_THRESHOLDS.memoryPercent) {
      raise('high_memory_usage', `Memory usage: ${memoryPercent.toFixed(1)}%`);
    }

    return raised;
  }

  /**
   * Alerts from the trailing `sinceMs`, newest first.
   */
  recentAlerts(limit = 50, sinceMs = 24 * 60 * 60_000): Alert[] {
    const cutoff = Date.now() - sinceMs;
    return this.alerts
      .filter((alert) => alert.timestamp >= cutoff)
      .reverse()
      .slice(0, limit);
  }

  /**
   * Samples of every metric recorded in the trailing `sinceMs`, plus host usage.
   */
  snapshot(sinceMs = 60 * 60_000): MonitoringSnapshot {
    const now = Date.now();
    const requestMetrics: Record<string, MetricSampleView[]> = {};
    for (const name of this.samples.keys()) {
      const recent = this.since(name, now - sinceMs);
      if (recent.length === 0) continue;
      requestMetrics[name] = recent.map((s) => ({
        value: s.value,
        timestamp: new Date(s.timestamp).toISOString(),
        tags: s.tags,
      }));
    }

    const { cpuPercent, memoryPercent } = this.host.sample();
    return {
      timestamp: new Date(now).toISOString(),
      requestMetrics,
      systemMetrics: { cpuUsage: cpuPercent, memoryUsage: memoryPercent },
    };
  }

  private raise(type: AlertType, message: string, now: number): Alert | null {
    const last = this.lastRaised.get(type);
    if (last !== undefined && now - last < this.cooldownMs) return null;
    this.lastRaised.set(type, now);

    const alert: Alert = { alertType: type, message, timestamp: now, service: ALERT_SERVICE };
    this.alerts.push(alert);
    if (this.alerts.length > ALERT_BUFFER_SIZE) this.alerts.shift();

    this.logger.warn(`ALERT: ${message}`, { event: 'alert_triggered', alertType: type });
    this.alertSink.alert(alert).catch((err: unknown) => {
      this.logger.warn('[Monitoring] Failed to deliver alert', {
        event: 'alert_delivery_error',
        alertType: type,
        error: errorMessage(err),
      });
    });
    return alert;
  }

  private since(name: string, cutoff: number): Sample[] {
    return (this.samples.get(name) ?? []).filter((s) => s.timestamp >= cutoff);
  }

  private countSince(name: string, cutoff: number): number {
    return this.since(name, cutoff).length;
  }

  private sumSince(name: string, cutoff: number): number {
    return this.since(name, cutoff).reduce((sum, s) => sum + s.value, 0);
  }
}
