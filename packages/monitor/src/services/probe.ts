import { PROBE_TIMEOUT_MS } from '@cdn-monitor/shared';
import type { ProbeResult, Server, ServerStatus } from '@cdn-monitor/shared';
import type { MonitorStore } from '../db';
import { TransportError, describeError } from '../errors';
import { buildAuthHeaders, httpGet, resolveTarget } from './http';
import type { FetchFn } from './http';

export interface ProbeOptions {
  fetch?: FetchFn;
  timeoutMs?: number;
}

/**
 * Connectivity check. Only HTTP 200 counts as reachable. The resulting status
 * is written to the store before returning so it survives later failures in
 * the same cycle.
 */
export async function probeServer(
  server: Server,
  store: Pick<MonitorStore, 'updateServerStatus'>,
  options: ProbeOptions = {},
): Promise<ProbeResult> {
  const start = performance.now();
  let result: ProbeResult;

  try {
    const url = resolveTarget(server);
    const res = await httpGet(url, {
      headers: buildAuthHeaders(server),
      timeoutMs: options.timeoutMs ?? PROBE_TIMEOUT_MS,
      fetch: options.fetch,
    });
    if (res.status === 200) {
      result = { reachable: true, latencyMs: res.elapsedMs, httpStatus: 200, errorDetail: null, status: 'up' };
    } else {
      result = {
        reachable: false,
        latencyMs: res.elapsedMs,
        httpStatus: res.status,
        errorDetail: `HTTP ${res.status}`,
        status: 'down',
      };
    }
  } catch (err) {
    const status: ServerStatus = err instanceof TransportError ? 'down' : 'unknown';
    const detail = describeError(err);
    if (status === 'down') {
      console.error(`[Probe] Connectivity test failed for ${server.hostname}: ${detail}`);
    } else {
      console.error(`[Probe] Unexpected error testing ${server.hostname}: ${detail}`);
    }
    result = {
      reachable: false,
      latencyMs: performance.now() - start,
      httpStatus: null,
      errorDetail: detail,
      status,
    };
  }

  try {
    store.updateServerStatus(server.id, result.status);
  } catch (err) {
    console.error(`[Probe] Failed to persist status for ${server.hostname}: ${describeError(err)}`);
  }

  return result;
}
