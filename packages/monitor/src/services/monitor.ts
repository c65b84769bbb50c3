import { DEFAULT_COLLECTION_CONCURRENCY, DEFAULT_COLLECTION_INTERVAL_MINUTES } from '@cdn-monitor/shared';
import type {
  Alert,
  AlertThresholds,
  BandwidthStats,
  CollectedMetrics,
  CycleReport,
  NewAlert,
  NewMetricSample,
  Server,
  ServerStatus,
} from '@cdn-monitor/shared';
import type { MonitorStore } from '../db';
import { PersistenceError, describeError } from '../errors';
import { collectMetrics } from '../collectors';
import { evaluateAlerts, numberSetting, thresholdsFromSettings } from './alerts';
import { probeServer } from './probe';
import { mapWithConcurrency } from './pool';
import { shouldNotify } from './notifier';
import type { Notifier } from './notifier';
import type { FetchFn } from './http';

export interface MonitorOptions {
  store: MonitorStore;
  notifier?: Notifier;
  fetch?: FetchFn;
  /** Overrides the `collection_interval_minutes` setting. */
  intervalMs?: number;
  /** Overrides the `collection_concurrency` setting. */
  concurrency?: number;
  now?: () => number;
}

interface ServerOutcome {
  server: Server;
  previousStatus: ServerStatus;
  sample: NewMetricSample;
  alerts: NewAlert[];
  reachable: boolean;
  failed: boolean;
}

interface CommitResult {
  created: Alert[];
  written: ServerOutcome[];
}

export function minimalSample(serverId: number, timestamp: number): NewMetricSample {
  return {
    server_id: serverId,
    timestamp,
    cpu_usage: null,
    memory_usage: null,
    memory_total: null,
    memory_used: null,
    active_connections: 0,
    hls_connections: 0,
    bytes_sent: 0,
    bytes_received: 0,
    bandwidth_in: 0,
    bandwidth_out: 0,
    stream_count: 0,
    uptime: null,
    response_time: null,
    error_count: 1,
  };
}

/** Sample response time is the connectivity probe's round-trip. */
export function buildSample(
  serverId: number,
  timestamp: number,
  collected: CollectedMetrics,
  latencyMs: number,
): NewMetricSample {
  const { bandwidth } = collected;
  const bw: BandwidthStats = bandwidth && bandwidth.ok ? bandwidth.stats : {};
  return {
    server_id: serverId,
    timestamp,
    cpu_usage: collected.cpuUsage ?? null,
    memory_usage: collected.memoryUsage ?? null,
    memory_total: collected.memoryTotal ?? null,
    memory_used: collected.memoryUsed ?? null,
    active_connections: collected.activeConnections,
    hls_connections: collected.hlsConnections,
    bytes_sent: bw.bytesSent ?? 0,
    bytes_received: bw.bytesReceived ?? 0,
    bandwidth_in: bw.bandwidthIn ?? 0,
    bandwidth_out: bw.bandwidthOut ?? 0,
    stream_count: bw.streamCount ?? 0,
    uptime: collected.uptime ?? null,
    response_time: latencyMs,
    error_count: collected.errorCount,
  };
}

/**
 * Polls every registered server on a fixed interval. Cycles never overlap:
 * the next one is scheduled only after the current one has committed.
 */
export class Monitor {
  private readonly store: MonitorStore;
  private readonly notifier: Notifier | undefined;
  private readonly fetchFn: FetchFn | undefined;
  private readonly now: () => number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<CycleReport> | null = null;
  private active = false;
  // Bumped by every start() and stop(); a tick from an older run never reschedules.
  private generation = 0;

  constructor(private readonly options: MonitorOptions) {
    this.store = options.store;
    this.notifier = options.notifier;
    this.fetchFn = options.fetch;
    this.now = options.now ?? Date.now;
  }

  isRunning(): boolean {
    return this.active;
  }

  /** Runs a cycle immediately, then keeps collecting on the interval until stopped. */
  start(): void {
    if (this.active) return;
    this.active = true;
    const generation = ++this.generation;
    const intervalMs = this.resolveInterval();
    console.log(`[Monitor] Collecting metrics every ${intervalMs / 1000}s`);
    this.tick(intervalMs, generation);
  }

  /** Cancels the schedule and waits for an in-flight cycle to finish. */
  async stop(): Promise<void> {
    this.active = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  async restart(): Promise<void> {
    await this.stop();
    this.start();
  }

  /** Runs one cycle, or joins the one already running. */
  runCycle(): Promise<CycleReport> {
    if (this.inFlight) return this.inFlight;
    const cycle = this.executeCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private tick(intervalMs: number, generation: number): void {
    const started = this.now();
    const scheduleNext = (): void => {
      if (generation !== this.generation) return;
      const delay = Math.max(0, intervalMs - (this.now() - started));
      this.timer = setTimeout(() => this.tick(intervalMs, generation), delay);
    };
    this.runCycle().then(scheduleNext, err => {
      console.error(`[Monitor] Cycle crashed: ${describeError(err)}`);
      scheduleNext();
    });
  }

  private resolveInterval(): number {
    if (this.options.intervalMs !== undefined) return this.options.intervalMs;
    const minutes = numberSetting(this.readSetting('collection_interval_minutes'), DEFAULT_COLLECTION_INTERVAL_MINUTES);
    return Math.max(minutes, 0.1) * 60_000;
  }

  private resolveConcurrency(serverCount: number): number {
    const configured = this.options.concurrency
      ?? numberSetting(this.readSetting('collection_concurrency'), DEFAULT_COLLECTION_CONCURRENCY);
    return Math.max(1, Math.min(Math.floor(configured), serverCount));
  }

  private readSetting(key: string): string | null {
    try {
      return this.store.getSetting(key);
    } catch (err) {
      console.error(`[Monitor] Could not read setting ${key}: ${describeError(err)}`);
      return null;
    }
  }

  private async executeCycle(): Promise<CycleReport> {
    const startedAt = this.now();
    const report: CycleReport = {
      startedAt,
      finishedAt: startedAt,
      servers: 0,
      samplesWritten: 0,
      alertsCreated: 0,
      unreachable: 0,
      failures: 0,
      committed: false,
    };

    let servers: Server[];
    try {
      servers = this.store.listServers();
    } catch (err) {
      console.error(`[Monitor] Could not load servers: ${describeError(err)}`);
      report.finishedAt = this.now();
      return report;
    }
    report.servers = servers.length;

    const thresholds = thresholdsFromSettings(key => this.readSetting(key));
    const outcomes: ServerOutcome[] = [];
    await mapWithConcurrency(servers, this.resolveConcurrency(servers.length), async server => {
      outcomes.push(await this.processServer(server, thresholds));
    });

    report.unreachable = outcomes.filter(o => !o.reachable).length;
    report.failures = outcomes.filter(o => o.failed).length;

    const result = this.commit(outcomes);
    if (result) {
      report.committed = true;
      report.samplesWritten = result.written.length;
      report.alertsCreated = result.created.length;
    }

    this.notify(result?.written ?? outcomes, result?.created ?? []);

    report.finishedAt = this.now();
    console.log(
      `[Monitor] Cycle done: ${report.servers} servers, ${report.unreachable} unreachable, ${report.alertsCreated} new alerts in ${report.finishedAt - startedAt}ms`
    );
    return report;
  }

  private async processServer(server: Server, thresholds: AlertThresholds): Promise<ServerOutcome> {
    const timestamp = this.now();
    let current = server;
    let reachable = false;
    try {
      const probe = await probeServer(server, this.store, { fetch: this.fetchFn });
      current = { ...server, status: probe.status };
      reachable = probe.reachable;

      const sample = probe.reachable
        ? buildSample(server.id, timestamp, await collectMetrics(current, { fetch: this.fetchFn }), probe.latencyMs)
        : minimalSample(server.id, timestamp);
      const alerts = evaluateAlerts(current, sample, this.store, thresholds, timestamp);
      return { server: current, previousStatus: server.status, sample, alerts, reachable, failed: false };
    } catch (err) {
      console.error(`[Monitor] Error collecting metrics for ${server.hostname}: ${describeError(err)}`);
      return {
        server: current,
        previousStatus: server.status,
        sample: minimalSample(server.id, timestamp),
        alerts: [],
        reachable,
        failed: true,
      };
    }
  }

  /**
   * Writes the cycle's samples and alerts in one transaction. The dedup check
   * is repeated inside it, so an alert opened since evaluation is not doubled.
   * Servers deleted while the cycle ran are skipped. Returns null when the
   * batch was dropped.
   */
  private commit(outcomes: ServerOutcome[]): CommitResult | null {
    try {
      return this.store.transaction(() => {
        const created: Alert[] = [];
        const written: ServerOutcome[] = [];
        for (const outcome of outcomes) {
          if (!this.store.getServer(outcome.server.id)) {
            console.warn(`[Monitor] ${outcome.server.hostname} was removed during the cycle, sample dropped`);
            continue;
          }
          this.store.appendMetric(outcome.sample);
          written.push(outcome);
          for (const alert of outcome.alerts) {
            if (this.store.findUnacknowledgedAlert(alert.server_id, alert.alert_type)) continue;
            created.push(this.store.insertAlert(alert));
          }
        }
        return { created, written };
      });
    } catch (err) {
      const error = new PersistenceError(`Failed to save metrics for ${outcomes.length} server(s)`, { cause: err });
      console.error(`[Monitor] ${describeError(error)}; batch discarded`);
      return null;
    }
  }

  private notify(outcomes: ServerOutcome[], created: Alert[]): void {
    const notifier = this.notifier;
    if (!notifier) return;

    const byId = new Map<number, Server>();
    for (const outcome of outcomes) {
      byId.set(outcome.server.id, outcome.server);
      if (outcome.server.status === 'down' && outcome.previousStatus !== 'down') {
        guard(outcome.server.hostname, () => notifier.serverDown(outcome.server));
      }
    }

    for (const alert of created) {
      const server = byId.get(alert.server_id);
      if (server && shouldNotify(alert)) {
        guard(server.hostname, () => notifier.alertRaised(alert, server));
      }
    }
  }
}

function guard(hostname: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    console.error(`[Monitor] Notifier failed for ${hostname}: ${describeError(err)}`);
  }
}
