import Database from 'better-sqlite3';
import { SCHEMA } from './schema';
import { DEFAULT_SETTINGS } from '@cdn-monitor/shared';
import type {
  Alert,
  AlertFilter,
  AlertType,
  AlertWithServer,
  MetricRange,
  MetricSample,
  NewAlert,
  NewMetricSample,
  RegisterServerRequest,
  Server,
  ServerStatus,
} from '@cdn-monitor/shared';

/** The operations the collection engine needs from persistence. */
export interface MonitorStore {
  listServers(): Server[];
  getServer(id: number): Server | null;
  updateServerStatus(id: number, status: ServerStatus): void;
  appendMetric(sample: NewMetricSample): void;
  findUnacknowledgedAlert(serverId: number, type: AlertType): Alert | null;
  insertAlert(alert: NewAlert): Alert;
  transaction<T>(fn: () => T): T;
  getSetting(key: string): string | null;
}

export interface Store extends MonitorStore {
  getServerByHostname(hostname: string): Server | null;
  createServer(req: RegisterServerRequest): Server;
  /** Replaces the server's fields; credentials left undefined keep their stored value. */
  updateServer(id: number, req: RegisterServerRequest): Server | null;
  deleteServer(id: number): boolean;
  getMetrics(serverId: number, range?: MetricRange): MetricSample[];
  getLatestMetric(serverId: number): MetricSample | null;
  getAlerts(filter?: AlertFilter): AlertWithServer[];
  getAlert(id: number): Alert | null;
  acknowledgeAlert(id: number, at?: number): boolean;
  markAlertNotified(id: number): void;
  getAllSettings(): Record<string, string>;
  setSetting(key: string, value: string): void;
  close(): void;
}

interface AlertRow extends Omit<Alert, 'acknowledged'> {
  acknowledged: number;
}

interface AlertWithServerRow extends AlertRow {
  server_hostname: string | null;
}

function toAlert(row: AlertRow): Alert {
  return { ...row, acknowledged: row.acknowledged === 1 };
}

export function createStore(path: string = process.env.DB_PATH || 'monitor.db'): Store {
  const db = new Database(path);
  db.exec('PRAGMA journal_mode = WAL');
  db.exec('PRAGMA foreign_keys = ON');
  db.exec(SCHEMA);

  // Seed default settings
  const insertSetting = db.prepare<[string, string]>('INSERT OR IGNORE INTO settings (key, value) VALUES (?, ?)');
  for (const [key, value] of Object.entries(DEFAULT_SETTINGS)) {
    insertSetting.run(key, value);
  }

  // --- Servers ---

  const selectServers = db.prepare<[], Server>('SELECT * FROM servers ORDER BY hostname');
  const selectServer = db.prepare<[number], Server>('SELECT * FROM servers WHERE id = ?');
  const selectServerByHostname = db.prepare<[string], Server>('SELECT * FROM servers WHERE hostname = ?');

  function listServers(): Server[] {
    return selectServers.all();
  }

  function getServer(id: number): Server | null {
    return selectServer.get(id) ?? null;
  }

  function getServerByHostname(hostname: string): Server | null {
    return selectServerByHostname.get(hostname) ?? null;
  }

  function createServer(req: RegisterServerRequest): Server {
    const now = Date.now();
    const result = db.prepare(
      'INSERT INTO servers (hostname, ip_address, port, role, status, api_endpoint, api_type, api_token, api_username, api_password, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)'
    ).run(
      req.hostname,
      req.ip_address,
      req.port ?? 80,
      req.role,
      'unknown',
      req.api_endpoint || null,
      req.api_type ?? 'srs',
      req.api_token || null,
      req.api_username || null,
      req.api_password || null,
      now,
      now,
    );
    const created = getServer(Number(result.lastInsertRowid));
    if (!created) throw new Error(`Server ${req.hostname} vanished after insert`);
    return created;
  }

  function updateServer(id: number, req: RegisterServerRequest): Server | null {
    const existing = getServer(id);
    if (!existing) return null;
    const keep = (value: string | null | undefined, stored: string | null) =>
      value === undefined ? stored : value || null;
    db.prepare(
      'UPDATE servers SET hostname = ?, ip_address = ?, port = ?, role = ?, api_endpoint = ?, api_type = ?, api_token = ?, api_username = ?, api_password = ?, updated_at = ? WHERE id = ?'
    ).run(
      req.hostname,
      req.ip_address,
      req.port ?? 80,
      req.role,
      req.api_endpoint || null,
      req.api_type ?? 'srs',
      keep(req.api_token, existing.api_token),
      keep(req.api_username, existing.api_username),
      keep(req.api_password, existing.api_password),
      Date.now(),
      id,
    );
    return getServer(id);
  }

  function updateServerStatus(id: number, status: ServerStatus): void {
    db.prepare('UPDATE servers SET status = ?, updated_at = ? WHERE id = ?').run(status, Date.now(), id);
  }

  function deleteServer(id: number): boolean {
    return db.prepare('DELETE FROM servers WHERE id = ?').run(id).changes > 0;
  }

  // --- Metrics ---

  const insertMetric = db.prepare(`
    INSERT INTO metrics (server_id, timestamp, cpu_usage, memory_usage, memory_total, memory_used, active_connections, hls_connections,
      bytes_sent, bytes_received, bandwidth_in, bandwidth_out, stream_count, uptime, response_time, error_count)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  function appendMetric(m: NewMetricSample): void {
    insertMetric.run(
      m.server_id, m.timestamp, m.cpu_usage, m.memory_usage, m.memory_total, m.memory_used, m.active_connections, m.hls_connections,
      m.bytes_sent, m.bytes_received, m.bandwidth_in, m.bandwidth_out, m.stream_count, m.uptime, m.response_time, m.error_count,
    );
  }

  function getMetrics(serverId: number, range: MetricRange = {}): MetricSample[] {
    return db.prepare<[number, number, number, number], MetricSample>(
      'SELECT * FROM metrics WHERE server_id = ? AND timestamp >= ? AND timestamp <= ? ORDER BY timestamp DESC, id DESC LIMIT ?'
    ).all(serverId, range.since ?? 0, range.until ?? Number.MAX_SAFE_INTEGER, range.limit ?? -1);
  }

  function getLatestMetric(serverId: number): MetricSample | null {
    return db.prepare<[number], MetricSample>(
      'SELECT * FROM metrics WHERE server_id = ? ORDER BY timestamp DESC, id DESC LIMIT 1'
    ).get(serverId) ?? null;
  }

  // --- Alerts ---

  const selectOpenAlert = db.prepare<[number, string], AlertRow>(
    'SELECT * FROM alerts WHERE server_id = ? AND alert_type = ? AND acknowledged = 0 ORDER BY id LIMIT 1'
  );

  function getAlerts(filter: AlertFilter = {}): AlertWithServer[] {
    const clauses: string[] = [];
    const params: (number | string)[] = [];
    if (filter.acknowledged !== undefined) {
      clauses.push('a.acknowledged = ?');
      params.push(filter.acknowledged ? 1 : 0);
    }
    if (filter.serverId !== undefined) {
      clauses.push('a.server_id = ?');
      params.push(filter.serverId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(filter.limit ?? 200);
    const rows = db.prepare<(number | string)[], AlertWithServerRow>(
      `SELECT a.*, s.hostname AS server_hostname FROM alerts a LEFT JOIN servers s ON s.id = a.server_id ${where} ORDER BY a.created_at DESC, a.id DESC LIMIT ?`
    ).all(...params);
    return rows.map(row => ({ ...toAlert(row), server_hostname: row.server_hostname }));
  }

  function getAlert(id: number): Alert | null {
    const row = db.prepare<[number], AlertRow>('SELECT * FROM alerts WHERE id = ?').get(id);
    return row ? toAlert(row) : null;
  }

  function findUnacknowledgedAlert(serverId: number, type: AlertType): Alert | null {
    const row = selectOpenAlert.get(serverId, type);
    return row ? toAlert(row) : null;
  }

  function insertAlert(alert: NewAlert): Alert {
    const result = db.prepare(
      'INSERT INTO alerts (server_id, alert_type, severity, message, acknowledged, created_at, acknowledged_at, notified_discord) VALUES (?, ?, ?, ?, 0, ?, NULL, 0)'
    ).run(alert.server_id, alert.alert_type, alert.severity, alert.message, alert.created_at);
    return {
      ...alert,
      id: Number(result.lastInsertRowid),
      acknowledged: false,
      acknowledged_at: null,
      notified_discord: 0,
    };
  }

  function acknowledgeAlert(id: number, at: number = Date.now()): boolean {
    return db.prepare('UPDATE alerts SET acknowledged = 1, acknowledged_at = ? WHERE id = ? AND acknowledged = 0').run(at, id).changes > 0;
  }

  function markAlertNotified(id: number): void {
    db.prepare('UPDATE alerts SET notified_discord = 1 WHERE id = ?').run(id);
  }

  // --- Settings ---

  function getAllSettings(): Record<string, string> {
    const rows = db.prepare<[], { key: string; value: string }>('SELECT key, value FROM settings').all();
    const result: Record<string, string> = {};
    for (const row of rows) {
      result[row.key] = row.value;
    }
    return result;
  }

  function getSetting(key: string): string | null {
    const row = db.prepare<[string], { value: string }>('SELECT value FROM settings WHERE key = ?').get(key);
    return row?.value ?? null;
  }

  function setSetting(key: string, value: string): void {
    db.prepare('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)').run(key, value);
  }

  return {
    listServers,
    getServer,
    getServerByHostname,
    createServer,
    updateServer,
    updateServerStatus,
    deleteServer,
    appendMetric,
    getMetrics,
    getLatestMetric,
    getAlerts,
    getAlert,
    findUnacknowledgedAlert,
    insertAlert,
    acknowledgeAlert,
    markAlertNotified,
    getAllSettings,
    getSetting,
    setSetting,
    transaction: <T>(fn: () => T): T => db.transaction(fn)(),
    close: () => db.close(),
  };
}
