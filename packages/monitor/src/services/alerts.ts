import { DEFAULT_THRESHOLDS } from '@cdn-monitor/shared';
import type { AlertSeverity, AlertThresholds, AlertType, NewAlert, NewMetricSample, Server } from '@cdn-monitor/shared';
import type { MonitorStore } from '../db';
import { describeError } from '../errors';

type SampleFields = Pick<NewMetricSample, 'cpu_usage' | 'memory_usage' | 'response_time'>;

export interface AlertRule {
  type: AlertType;
  severity: AlertSeverity;
  /** Returns the alert message when the rule fires, null otherwise. */
  check(server: Server, sample: SampleFields, thresholds: AlertThresholds): string | null;
}

export const ALERT_RULES: readonly AlertRule[] = [
  {
    type: 'server_down',
    severity: 'critical',
    check: server =>
      server.status === 'down' ? `Server ${server.hostname} is down and not responding to health checks.` : null,
  },
  {
    type: 'cpu_high',
    severity: 'warning',
    check: (server, { cpu_usage }, t) =>
      cpu_usage !== null && cpu_usage > t.cpuPercent ? `High CPU usage on ${server.hostname}: ${cpu_usage.toFixed(1)}%` : null,
  },
  {
    type: 'memory_high',
    severity: 'warning',
    check: (server, { memory_usage }, t) =>
      memory_usage !== null && memory_usage > t.memoryPercent
        ? `High memory usage on ${server.hostname}: ${memory_usage.toFixed(1)}%`
        : null,
  },
  {
    type: 'response_slow',
    severity: 'warning',
    check: (server, { response_time }, t) =>
      response_time !== null && response_time > t.responseTimeMs
        ? `Slow response time on ${server.hostname}: ${response_time.toFixed(0)}ms`
        : null,
  },
];

/**
 * Returns the alerts to insert for this server. A rule is skipped while an
 * unacknowledged alert of its type is still open for the server.
 */
export function evaluateAlerts(
  server: Server,
  sample: SampleFields,
  store: Pick<MonitorStore, 'findUnacknowledgedAlert'>,
  thresholds: AlertThresholds = DEFAULT_THRESHOLDS,
  now: number = Date.now(),
  rules: readonly AlertRule[] = ALERT_RULES,
): NewAlert[] {
  const alerts: NewAlert[] = [];

  for (const rule of rules) {
    try {
      const message = rule.check(server, sample, thresholds);
      if (message === null) continue;
      if (store.findUnacknowledgedAlert(server.id, rule.type)) continue;
      alerts.push({
        server_id: server.id,
        alert_type: rule.type,
        severity: rule.severity,
        message,
        created_at: now,
      });
    } catch (err) {
      console.error(`[Alerts] Rule ${rule.type} failed for ${server.hostname}: ${describeError(err)}`);
    }
  }

  return alerts;
}

export function thresholdsFromSettings(getSetting: (key: string) => string | null): AlertThresholds {
  return {
    cpuPercent: numberSetting(getSetting('cpu_alert_threshold'), DEFAULT_THRESHOLDS.cpuPercent),
    memoryPercent: numberSetting(getSetting('memory_alert_threshold'), DEFAULT_THRESHOLDS.memoryPercent),
    responseTimeMs: numberSetting(getSetting('response_time_alert_ms'), DEFAULT_THRESHOLDS.responseTimeMs),
  };
}

export function numberSetting(value: string | null, fallback: number): number {
  if (value === null || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}
