export const SCHEMA = `
CREATE TABLE IF NOT EXISTS servers (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  hostname TEXT NOT NULL UNIQUE,
  ip_address TEXT NOT NULL,
  port INTEGER NOT NULL DEFAULT 80,
  role TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'unknown',
  api_endpoint TEXT,
  api_type TEXT NOT NULL DEFAULT 'srs',
  api_token TEXT,
  api_username TEXT,
  api_password TEXT,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  server_id INTEGER NOT NULL REFERENCES servers(id) ON DELETE CASCADE,
  timestamp INTEGER NOT NULL,
  cpu_usage REAL,
  memory_usage REAL,
  memory_total INTEGER,
  memory_used INTEGER,
  active_connections INTEGER NOT NULL DEFAULT 0,
  hls_connections INTEGER NOT NULL DEFAULT 0,
  bytes_sent INTEGER NOT NULL DEFAULT 0,
  bytes_received INTEGER NOT NULL DEFAULT 0,
  bandwidth_in REAL NOT NULL DEFAULT 0,
  bandwidth_out REAL NOT NULL DEFAULT 0,
  stream_count INTEGER NOT NULL DEFAULT 0,
  uptime INTEGER,
  response_time REAL,
  error_count INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS alerts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  server_id INTEGER NOT NULL REFERENCES servers(id) ON DELETE CASCADE,
  alert_type TEXT NOT NULL,
  severity TEXT NOT NULL DEFAULT 'warning',
  message TEXT NOT NULL,
  acknowledged INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL,
  acknowledged_at INTEGER,
  notified_discord INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS settings (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_metrics_server_time ON metrics(server_id, timestamp);
CREATE INDEX IF NOT EXISTS idx_alerts_open ON alerts(server_id, alert_type, acknowledged);
CREATE INDEX IF NOT EXISTS idx_alerts_created ON alerts(created_at);
`;
