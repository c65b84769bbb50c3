import type { AlertThresholds } from './types';

export const DEFAULT_DASHBOARD_PORT = 3000;
export const DEFAULT_COLLECTION_INTERVAL_MINUTES = 5;
export const DEFAULT_COLLECTION_CONCURRENCY = 8;

export const PROBE_TIMEOUT_MS = 10_000;
export const ENRICHMENT_TIMEOUT_MS = 5_000;

export const DEFAULT_THRESHOLDS: AlertThresholds = {
  cpuPercent: 80,
  memoryPercent: 85,
  responseTimeMs: 5000,
};

export const DEFAULT_SETTINGS: Record<string, string> = {
  discord_webhook_url: '',
  discord_enabled: 'false',
  collection_interval_minutes: String(DEFAULT_COLLECTION_INTERVAL_MINUTES),
  collection_concurrency: String(DEFAULT_COLLECTION_CONCURRENCY),
  cpu_alert_threshold: String(DEFAULT_THRESHOLDS.cpuPercent),
  memory_alert_threshold: String(DEFAULT_THRESHOLDS.memoryPercent),
  response_time_alert_ms: String(DEFAULT_THRESHOLDS.responseTimeMs),
};

export const SEVERITY_COLORS = {
  info: 0x3498db,
  warning: 0xf39c12,
  error: 0xe67e22,
  critical: 0xe74c3c,
  recovery: 0x2ecc71,
} as const;

export const STATUS_LABELS: Record<string, string> = {
  up: 'Up',
  down: 'Down',
  unknown: 'Unknown',
};
