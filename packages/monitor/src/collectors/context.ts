import type { CollectedMetrics } from '@cdn-monitor/shared';
import type { FetchFn } from '../services/http';

export interface CollectContext {
  hostname: string;
  headers: Record<string, string>;
  timeoutMs: number;
  enrichmentTimeoutMs: number;
  fetch?: FetchFn;
}

/** One implementation per API dialect; all return the common metric shape. */
export type DialectCollector = (endpoint: string, ctx: CollectContext) => Promise<CollectedMetrics>;

export function emptyMetrics(): CollectedMetrics {
  return { activeConnections: 0, hlsConnections: 0, errorCount: 0 };
}
