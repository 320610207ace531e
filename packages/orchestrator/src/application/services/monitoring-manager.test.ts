import 'reflect-metadata';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OrchestratorConfigSchema, type OrchestratorConfigInput } from '@ventanilla/shared';
import { MonitoringManager } from './monitoring-manager.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import type { HostUsage } from '../../domain/interfaces/host-probe.interface.js';
import { Logger } from '../../logger.js';

const START = Date.parse('2026-03-01T10:00:00Z');

describe('MonitoringManager', () => {
  let recordMetric: ReturnType<typeof vi.fn>;
  let deliverAlert: ReturnType<typeof vi.fn>;
  let usage: HostUsage;
  let logger: Logger;

  const build = (overrides: OrchestratorConfigInput['monitoring'] = {}) =>
    new MonitoringManager(
      { record: recordMetric },
      { alert: deliverAlert },
      { sample: () => usage },
      new ConfigService(
        OrchestratorConfigSchema.parse({
          monitoring: { windowMinutes: 15, alertCooldownSeconds: 300, ...overrides },
        }),
      ),
      logger,
    );

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
    recordMetric = vi.fn().mockResolvedValue(undefined);
    deliverAlert = vi.fn().mockResolvedValue(undefined);
    usage = { cpuPercent: 10, memoryPercent: 20 };
    logger = new Logger({ level: 'silent', pretty: false });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('mirrors metrics to the sink when enabled', () => {
    const monitoring = build();
    monitoring.record('agent_response_time', 0.3, { intent: 'pqrsd_crear' });

    expect(recordMetric).toHaveBeenCalledWith({
      name: 'agent_response_time',
      value: 0.3,
      timestamp: START,
      tags: { intent: 'pqrsd_crear' },
    });
  });

  it('keeps metrics in memory only when disabled', () => {
    const monitoring = build({ enabled: false });
    monitoring.record('request_processing_time', 1.5);

    expect(recordMetric).not.toHaveBeenCalled();
    expect(monitoring.averageResponseTime()).toBe(1.5);
  });

  it('logs and swallows a failing metric sink', async () => {
    recordMetric.mockRejectedValue(new Error('database is locked'));
    const warn = vi.spyOn(logger, 'warn');
    const monitoring = build();

    monitoring.record('processing_error', 1);
    await vi.waitFor(() => expect(warn).toHaveBeenCalled());

    expect(warn).toHaveBeenCalledWith('[Monitoring] Failed to store metric', {
      event: 'metric_store_error',
      metric: 'processing_error',
      error: 'database is locked',
    });
  });

  it('caps samples per metric, dropping the oldest', () => {
    const monitoring = build({ maxSamplesPerMetric: 3 });
    for (const value of [1, 2, 3, 4, 5]) monitoring.record('request_processing_time', value);

    expect(monitoring.averageResponseTime()).toBe(4);
  });

  it('computes the error rate over the trailing window', () => {
    const monitoring = build();
    monitoring.record('agent_timeout', 1);
    vi.setSystemTime(START + 16 * 60_000);
    for (let i = 0; i < 8; i++) monitoring.record('request_processing_time', 0.5);
    monitoring.record('agent_request_error', 1);
    monitoring.record('processing_error', 1);
    monitoring.record('processing_error', 1);

    // 3 failures in window over 8 processed + 2 failed = 10 requests.
    expect(monitoring.errorRate()).toBeCloseTo(0.3);
  });

  it('raises each threshold alert once per cooldown', () => {
    usage = { cpuPercent: 91.25, memoryPercent: 85 };
    const monitoring = build();
    monitoring.record('request_processing_time', 7);
    monitoring.record('processing_error', 1);

    const first = monitoring.checkAlerts();
    expect(first.map((a) => [a.alertType, a.message])).toEqual([
      ['high_error_rate', 'Error rate: 50.00%'],
      ['high_response_time', 'Avg response time: 7.00s'],
      ['high_cpu_usage', 'CPU usage: 91.3%'],
      ['high_memory_usage', 'Memory usage: 85.0%'],
    ]);
    expect(deliverAlert).toHaveBeenCalledTimes(4);

    vi.setSystemTime(START + 299_000);
    expect(monitoring.checkAlerts()).toEqual([]);

    vi.setSystemTime(START + 300_000);
    expect(monitoring.checkAlerts()).toHaveLength(4);
  });

  it('raises nothing under the thresholds', () => {
    const monitoring = build();
    monitoring.record('request_processing_time', 0.4);
    expect(monitoring.checkAlerts()).toEqual([]);
  });

  it('lists recent alerts newest first', () => {
    usage = { cpuPercent: 95, memoryPercent: 10 };
    const monitoring = build({ alertCooldownSeconds: 0 });
    monitoring.checkAlerts();
    vi.setSystemTime(START + 1_000);
    usage = { cpuPercent: 10, memoryPercent: 99 };
    monitoring.checkAlerts();

    expect(monitoring.recentAlerts(1)).toEqual([
      {
        alertType: 'high_memory_usage',
        message: 'Memory usage: 99.0%',
        timestamp: START + 1_000,
        service: 'orchestrator',
      },
    ]);
    vi.setSystemTime(START + 25 * 60 * 60_000);
    expect(monitoring.recentAlerts()).toEqual([]);
  });

  it('snapshots the last hour of samples with host usage', () => {
    const monitoring = build();
    monitoring.record('security_violation', 1);
    vi.setSystemTime(START + 2 * 60 * 60_000);
    monitoring.record('request_processing_time', 0.25, { intent: 'saludo', confidence: '0.95' });

    expect(monitoring.snapshot()).toEqual({
      timestamp: '2026-03-01T12:00:00.000Z',
      requestMetrics: {
        request_processing_time: [
          {
            value: 0.25,
            timestamp: '2026-03-01T12:00:00.000Z',
            tags: { intent: 'saludo', confidence: '0.95' },
          },
        ],
      },
      systemMetrics: { cpuUsage: 10, memoryUsage: 20 },
    });
  });
});
