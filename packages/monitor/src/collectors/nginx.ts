import { ProtocolError } from '../errors';
import { httpGet } from '../services/http';
import { emptyMetrics } from './context';
import type { DialectCollector } from './context';

const NUMERIC = /^\d+$/;

/**
 * Parses NGINX stub_status output:
 *
 *   Active connections: 291
 *   server accepts handled requests
 *    16630948 16630948 31070465
 *   Reading: 6 Writing: 179 Waiting: 106
 *
 * The labelled line wins; the counters line is only used when it is missing.
 */
export function parseStubStatus(text: string): number | undefined {
  let fallback: number | undefined;

  for (const raw of text.trim().split('\n')) {
    const line = raw.trim();
    if (line.includes('Active connections:')) {
      const token = (line.split(':')[1] ?? '').trim();
      if (!NUMERIC.test(token)) {
        throw new ProtocolError(`Unparsable stub_status line: "${line}"`);
      }
      return Number(token);
    }
    const parts = line.split(/\s+/);
    if (fallback === undefined && parts.length >= 3 && parts.every(p => NUMERIC.test(p))) {
      fallback = Number(parts[0]);
    }
  }

  return fallback;
}

export const collectNginx: DialectCollector = async (endpoint, ctx) => {
  const res = await httpGet(endpoint, { headers: ctx.headers, timeoutMs: ctx.timeoutMs, fetch: ctx.fetch });
  const metrics = emptyMetrics();
  if (res.status !== 200) {
    console.warn(`[NGINX] ${endpoint} returned HTTP ${res.status} for ${ctx.hostname}`);
    return metrics;
  }
  metrics.activeConnections = parseStubStatus(res.body) ?? 0;
  metrics.responseTimeMs = res.elapsedMs;
  return metrics;
};
