import { httpGet, isRecord, toNumber } from '../services/http';
import { emptyMetrics } from './context';
import type { DialectCollector } from './context';

export const collectGeneric: DialectCollector = async (endpoint, ctx) => {
  const res = await httpGet(endpoint, { headers: ctx.headers, timeoutMs: ctx.timeoutMs, fetch: ctx.fetch });
  const metrics = emptyMetrics();
  if (res.status !== 200) return metrics;

  metrics.responseTimeMs = res.elapsedMs;

  let data: unknown;
  try {
    data = JSON.parse(res.body);
  } catch {
    console.debug(`[Collector] ${ctx.hostname} health endpoint is not JSON, recording response time only`);
    return metrics;
  }
  if (!isRecord(data)) return metrics;

  const connections = toNumber(data.connections);
  const cpu = toNumber(data.cpu);
  const memory = toNumber(data.memory);
  if (connections !== undefined) metrics.activeConnections = Math.trunc(connections);
  if (cpu !== undefined) metrics.cpuUsage = cpu;
  if (memory !== undefined) metrics.memoryUsage = memory;
  return metrics;
};
