import type { BandwidthResult, BandwidthStats } from '@cdn-monitor/shared';
import { ProtocolError, describeError } from '../errors';
import { httpGet, isRecord, parseJson, toNumber, trimEndpoint } from '../services/http';
import { emptyMetrics } from './context';
import type { CollectContext, DialectCollector } from './context';

/**
 * SRS media server. Connection counts come from /api/v1/clients; bandwidth is
 * best-effort, from /api/v1/streams with /api/v1/summaries as the fallback.
 */
export const collectSrs: DialectCollector = async (endpoint, ctx) => {
  const base = trimEndpoint(endpoint);
  const url = `${base}/api/v1/clients`;
  const res = await httpGet(url, { headers: ctx.headers, timeoutMs: ctx.timeoutMs, fetch: ctx.fetch });

  const metrics = emptyMetrics();
  if (res.status !== 200) {
    console.warn(`[SRS] ${url} returned HTTP ${res.status} for ${ctx.hostname}`);
    return metrics;
  }

  const data = parseJson(res.body, url);
  if (!isRecord(data)) {
    throw new ProtocolError(`Unexpected clients payload from ${url}`, res.status);
  }
  const clients = Array.isArray(data.clients) ? data.clients : [];
  metrics.activeConnections = clients.length;
  metrics.hlsConnections = clients.filter(c => isRecord(c) && c.type === 'hls').length;
  metrics.responseTimeMs = res.elapsedMs;
  metrics.bandwidth = await fetchSrsBandwidth(base, ctx);
  return metrics;
};

export async function fetchSrsBandwidth(base: string, ctx: CollectContext): Promise<BandwidthResult> {
  const streams = await readStreams(base, ctx);
  if (streams.ok) return streams;
  console.debug(`[SRS] Could not get streams data for ${ctx.hostname}: ${streams.reason}`);

  const summaries = await readSummaries(base, ctx);
  if (!summaries.ok) {
    console.debug(`[SRS] Could not get fallback stats for ${ctx.hostname}: ${summaries.reason}`);
  }
  return summaries;
}

/** The stream list shows up at the top level, bare, or under `data`, depending on SRS version. */
export function extractStreams(body: unknown): unknown[] | null {
  if (Array.isArray(body)) return body;
  if (!isRecord(body)) return null;
  if (Array.isArray(body.streams)) return body.streams;
  if (isRecord(body.data) && Array.isArray(body.data.streams)) return body.data.streams;
  return null;
}

export function sumStreams(streams: unknown[]): BandwidthStats {
  let kbpsIn = 0;
  let kbpsOut = 0;
  let bytesIn = 0;
  let bytesOut = 0;

  for (const stream of streams) {
    if (!isRecord(stream)) continue;
    const { kbps, bytes } = stream;
    if (isRecord(kbps)) {
      kbpsIn += toNumber(kbps.recv_30s) ?? 0;
      kbpsOut += toNumber(kbps.send_30s) ?? 0;
    }
    if (isRecord(bytes)) {
      bytesIn += Math.trunc(toNumber(bytes.recv) ?? 0);
      bytesOut += Math.trunc(toNumber(bytes.send) ?? 0);
    }
  }

  return {
    bandwidthIn: kbpsIn / 1000,
    bandwidthOut: kbpsOut / 1000,
    bytesReceived: bytesIn,
    bytesSent: bytesOut,
    streamCount: streams.length,
  };
}

export function readSummaryStats(data: Record<string, unknown>): BandwidthStats {
  const stats: BandwidthStats = {};
  const { kbps, bytes } = data;
  if (isRecord(kbps)) {
    const recv = toNumber(kbps.recv_30s);
    const send = toNumber(kbps.send_30s);
    if (recv !== undefined) stats.bandwidthIn = recv / 1000;
    if (send !== undefined) stats.bandwidthOut = send / 1000;
  }
  if (isRecord(bytes)) {
    const recv = toNumber(bytes.recv);
    const send = toNumber(bytes.send);
    if (recv !== undefined) stats.bytesReceived = Math.trunc(recv);
    if (send !== undefined) stats.bytesSent = Math.trunc(send);
  }
  return stats;
}

async function readStreams(base: string, ctx: CollectContext): Promise<BandwidthResult> {
  const url = `${base}/api/v1/streams`;
  try {
    const res = await httpGet(url, { headers: ctx.headers, timeoutMs: ctx.enrichmentTimeoutMs, fetch: ctx.fetch });
    if (res.status !== 200) return { ok: false, reason: `HTTP ${res.status} from ${url}` };
    const streams = extractStreams(parseJson(res.body, url));
    if (!streams) return { ok: false, reason: `no stream list in ${url}` };
    return { ok: true, source: 'streams', stats: sumStreams(streams) };
  } catch (err) {
    return { ok: false, reason: describeError(err) };
  }
}

async function readSummaries(base: string, ctx: CollectContext): Promise<BandwidthResult> {
  const url = `${base}/api/v1/summaries`;
  try {
    const res = await httpGet(url, { headers: ctx.headers, timeoutMs: ctx.enrichmentTimeoutMs, fetch: ctx.fetch });
    if (res.status !== 200) return { ok: false, reason: `HTTP ${res.status} from ${url}` };
    const body = parseJson(res.body, url);
    if (!isRecord(body) || !isRecord(body.data)) return { ok: false, reason: `no data section in ${url}` };
    return { ok: true, source: 'summaries', stats: readSummaryStats(body.data) };
  } catch (err) {
    return { ok: false, reason: describeError(err) };
  }
}
