import { ENRICHMENT_TIMEOUT_MS, PROBE_TIMEOUT_MS } from '@cdn-monitor/shared';
import type { ApiDialect, CollectedMetrics, Server } from '@cdn-monitor/shared';
import { describeError } from '../errors';
import { buildAuthHeaders } from '../services/http';
import type { FetchFn } from '../services/http';
import { emptyMetrics } from './context';
import type { DialectCollector } from './context';
import { collectSrs } from './srs';
import { collectNginx } from './nginx';
import { collectGeneric } from './generic';

export interface CollectOptions {
  fetch?: FetchFn;
  timeoutMs?: number;
  enrichmentTimeoutMs?: number;
}

function collectorFor(dialect: ApiDialect): DialectCollector {
  switch (dialect) {
    case 'srs':
      return collectSrs;
    case 'nginx':
      return collectNginx;
    default:
      return collectGeneric;
  }
}

/**
 * Fetches detailed metrics for a reachable server. Never throws: a transport
 * or parse failure yields the default record with errorCount = 1.
 */
export async function collectMetrics(server: Server, options: CollectOptions = {}): Promise<CollectedMetrics> {
  if (!server.api_endpoint) {
    console.warn(`[Collector] No API endpoint configured for server ${server.hostname}`);
    return emptyMetrics();
  }

  const collect = collectorFor(server.api_type);
  try {
    return await collect(server.api_endpoint, {
      hostname: server.hostname,
      headers: buildAuthHeaders(server),
      timeoutMs: options.timeoutMs ?? PROBE_TIMEOUT_MS,
      enrichmentTimeoutMs: options.enrichmentTimeoutMs ?? ENRICHMENT_TIMEOUT_MS,
      fetch: options.fetch,
    });
  } catch (err) {
    console.error(`[Collector] Failed to get metrics for ${server.hostname}: ${describeError(err)}`);
    return { ...emptyMetrics(), errorCount: 1 };
  }
}

