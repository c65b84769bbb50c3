export type ServerRole = 'origin' | 'edge' | 'load-balancer';
export type ServerStatus = 'up' | 'down' | 'unknown';
export type ApiDialect = 'srs' | 'nginx' | 'generic';

export interface Server {
  id: number;
  hostname: string;
  ip_address: string;
  port: number;
  role: ServerRole;
  status: ServerStatus;
  api_endpoint: string | null;
  api_type: ApiDialect;
  api_token: string | null;
  api_username: string | null;
  api_password: string | null;
  created_at: number;
  updated_at: number;
}

/** Server as returned by the API: credentials stripped. */
export type PublicServer = Omit<Server, 'api_token' | 'api_username' | 'api_password'>;

export interface MetricSample {
  id: number;
  server_id: number;
  timestamp: number;
  cpu_usage: number | null;
  memory_usage: number | null;
  memory_total: number | null;
  memory_used: number | null;
  active_connections: number;
  hls_connections: number;
  bytes_sent: number;
  bytes_received: number;
  bandwidth_in: number;
  bandwidth_out: number;
  stream_count: number;
  uptime: number | null;
  response_time: number | null;
  error_count: number;
}

export type NewMetricSample = Omit<MetricSample, 'id'>;

export type AlertType = 'server_down' | 'cpu_high' | 'memory_high' | 'response_slow';
export type AlertSeverity = 'info' | 'warning' | 'error' | 'critical';

export interface Alert {
  id: number;
  server_id: number;
  alert_type: AlertType;
  severity: AlertSeverity;
  message: string;
  acknowledged: boolean;
  created_at: number;
  acknowledged_at: number | null;
  notified_discord: number;
}

export type NewAlert = Pick<Alert, 'server_id' | 'alert_type' | 'severity' | 'message' | 'created_at'>;

export interface AlertWithServer extends Alert {
  server_hostname: string | null;
}

export interface MetricRange {
  since?: number;
  until?: number;
  limit?: number;
}

export interface AlertFilter {
  acknowledged?: boolean;
  serverId?: number;
  limit?: number;
}

export interface RegisterServerRequest {
  hostname: string;
  ip_address: string;
  port?: number;
  role: ServerRole;
  api_endpoint?: string | null;
  api_type?: ApiDialect;
  api_token?: string | null;
  api_username?: string | null;
  api_password?: string | null;
}

export interface ProbeResult {
  reachable: boolean;
  latencyMs: number;
  httpStatus: number | null;
  errorDetail: string | null;
  status: ServerStatus;
}

export interface BandwidthStats {
  bandwidthIn?: number;
  bandwidthOut?: number;
  bytesReceived?: number;
  bytesSent?: number;
  streamCount?: number;
}

/**
 * Outcome of a best-effort enrichment call. `ok: false` means no data was
 * available, which is distinct from data that parsed to zero.
 */
export type BandwidthResult =
  | { ok: true; source: 'streams' | 'summaries'; stats: BandwidthStats }
  | { ok: false; reason: string };

/** Dialect-independent result of one metric collection. */
export interface CollectedMetrics {
  activeConnections: number;
  hlsConnections: number;
  cpuUsage?: number;
  memoryUsage?: number;
  memoryTotal?: number;
  memoryUsed?: number;
  uptime?: number;
  bandwidth?: BandwidthResult;
  responseTimeMs?: number;
  errorCount: 0 | 1;
}

export interface AlertThresholds {
  cpuPercent: number;
  memoryPercent: number;
  responseTimeMs: number;
}

export interface CycleReport {
  startedAt: number;
  finishedAt: number;
  servers: number;
  samplesWritten: number;
  alertsCreated: number;
  unreachable: number;
  failures: number;
  committed: boolean;
}

export interface DashboardStats {
  total_servers: number;
  status_counts: Record<ServerStatus, number>;
  role_counts: Record<ServerRole, number>;
  total_connections: number;
}
