import { describe, it, expect, vi } from 'vitest';
import { evaluateAlerts, numberSetting, thresholdsFromSettings } from './alerts';
import type { AlertRule } from './alerts';
import { serverFixture } from '../testing';

const quiet = { cpu_usage: 10, memory_usage: 20, response_time: 50 };
const noneOpen = { findUnacknowledgedAlert: () => null };

describe('evaluateAlerts', () => {
  it('raises nothing for a healthy server', () => {
    expect(evaluateAlerts(serverFixture({ status: 'up' }), quiet, noneOpen)).toEqual([]);
  });

  it('raises a critical alert for a down server', () => {
    const alerts = evaluateAlerts(serverFixture({ status: 'down' }), quiet, noneOpen, undefined, 1000);
    expect(alerts).toEqual([{
      server_id: 1,
      alert_type: 'server_down',
      severity: 'critical',
      message: 'Server edge-1 is down and not responding to health checks.',
      created_at: 1000,
    }]);
  });

  it('formats threshold messages', () => {
    const alerts = evaluateAlerts(
      serverFixture({ status: 'up' }),
      { cpu_usage: 91.26, memory_usage: 90, response_time: 6000.4 },
      noneOpen,
    );
    expect(alerts.map(a => [a.alert_type, a.severity, a.message])).toEqual([
      ['cpu_high', 'warning', 'High CPU usage on edge-1: 91.3%'],
      ['memory_high', 'warning', 'High memory usage on edge-1: 90.0%'],
      ['response_slow', 'warning', 'Slow response time on edge-1: 6000ms'],
    ]);
  });

  it('only fires strictly above the threshold', () => {
    const atLimit = { cpu_usage: 80, memory_usage: 85, response_time: 5000 };
    expect(evaluateAlerts(serverFixture({ status: 'up' }), atLimit, noneOpen)).toEqual([]);
  });

  it('skips missing readings', () => {
    const empty = { cpu_usage: null, memory_usage: null, response_time: null };
    expect(evaluateAlerts(serverFixture({ status: 'up' }), empty, noneOpen)).toEqual([]);
  });

  it('uses the configured thresholds', () => {
    const thresholds = { cpuPercent: 95, memoryPercent: 85, responseTimeMs: 5000 };
    const alerts = evaluateAlerts(serverFixture({ status: 'up' }), { ...quiet, cpu_usage: 91 }, noneOpen, thresholds);
    expect(alerts).toEqual([]);
  });

  it('does not duplicate an alert that is still open', () => {
    const store = {
      findUnacknowledgedAlert: vi.fn((_id: number, type: string) =>
        type === 'cpu_high'
          ? {
              id: 9,
              server_id: 1,
              alert_type: 'cpu_high' as const,
              severity: 'warning' as const,
              message: 'High CPU usage on edge-1: 95.0%',
              acknowledged: false,
              created_at: 0,
              acknowledged_at: null,
              notified_discord: 0,
            }
          : null),
    };
    const alerts = evaluateAlerts(serverFixture({ status: 'up' }), { ...quiet, cpu_usage: 95, memory_usage: 99 }, store);
    expect(alerts.map(a => a.alert_type)).toEqual(['memory_high']);
  });

  it('keeps evaluating when one rule throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const broken: AlertRule = {
      type: 'cpu_high',
      severity: 'warning',
      check: () => {
        throw new Error('bad reading');
      },
    };
    const down: AlertRule = { type: 'server_down', severity: 'critical', check: () => 'down' };

    const alerts = evaluateAlerts(serverFixture(), quiet, noneOpen, undefined, 0, [broken, down]);

    expect(alerts.map(a => a.alert_type)).toEqual(['server_down']);
    expect(console.error).toHaveBeenCalledWith('[Alerts] Rule cpu_high failed for edge-1: bad reading');
  });
});

describe('thresholdsFromSettings', () => {
  it('reads overrides and falls back to defaults', () => {
    const settings: Record<string, string> = { cpu_alert_threshold: '70', memory_alert_threshold: 'high' };
    expect(thresholdsFromSettings(key => settings[key] ?? null)).toEqual({
      cpuPercent: 70,
      memoryPercent: 85,
      responseTimeMs: 5000,
    });
  });
});

describe('numberSetting', () => {
  it('falls back for null, blank and non-numeric values', () => {
    expect(numberSetting(null, 5)).toBe(5);
    expect(numberSetting('  ', 5)).toBe(5);
    expect(numberSetting('soon', 5)).toBe(5);
    expect(numberSetting('0.5', 5)).toBe(0.5);
  });
});
