import type { Alert, Metric } from '@ventanilla/shared';

/** Durable mirror for metrics. Callers never await delivery on the request path. */
export interface MetricSink {
  record(metric: Metric): Promise<void>;
}

/** Delivery channel for alerts (paging, chat, storage). */
export interface AlertSink {
  alert(alert: Alert): Promise<void>;
}
