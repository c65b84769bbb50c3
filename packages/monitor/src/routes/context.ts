import type { Store } from '../db';
import type { Monitor } from '../services/monitor';
import type { FetchFn } from '../services/http';

export interface AppContext {
  store: Store;
  monitor: Monitor;
  fetch?: FetchFn;
}

export function parseId(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

/** Accepts epoch milliseconds or anything Date.parse understands. */
export function parseTime(raw: string | undefined): number | null | undefined {
  if (raw === undefined || raw === '') return undefined;
  if (/^\d+$/.test(raw)) return Number(raw);
  const parsed = Date.parse(raw);
  return Number.isNaN(parsed) ? null : parsed;
}

export function parseLimit(raw: string | undefined, fallback: number, max: number): number {
  if (raw === undefined || !/^\d+$/.test(raw)) return fallback;
  return Math.min(Math.max(Number(raw), 1), max);
}
