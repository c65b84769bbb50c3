import { TransportError, ProtocolError } from '../errors';
import type { Server } from '@cdn-monitor/shared';

/** Fetch signature used for dependency injection in tests */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

type Credentials = Pick<Server, 'api_token' | 'api_username' | 'api_password'>;

export interface HttpResponse {
  status: number;
  body: string;
  elapsedMs: number;
}

export interface GetOptions {
  headers: Record<string, string>;
  timeoutMs: number;
  fetch?: FetchFn;
}

export function resolveTarget(server: Pick<Server, 'api_endpoint' | 'ip_address' | 'port'>): string {
  if (server.api_endpoint) return server.api_endpoint;
  return `http://${server.ip_address}:${server.port}`;
}

export function trimEndpoint(endpoint: string): string {
  return endpoint.replace(/\/+$/, '');
}

// Token wins over username/password when both are configured.
export function buildAuthHeaders(creds: Credentials): Record<string, string> {
  if (creds.api_token) {
    const token = creds.api_token.replace(/^Bearer\s+/i, '');
    return { Authorization: `Bearer ${token}` };
  }
  if (creds.api_username && creds.api_password) {
    const encoded = Buffer.from(`${creds.api_username}:${creds.api_password}`).toString('base64');
    return { Authorization: `Basic ${encoded}` };
  }
  return {};
}

function isAbort(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false;
  return err.name === 'AbortError' || err.name === 'TimeoutError';
}

/**
 * Maps a failed fetch onto TransportError where the network itself failed.
 * Anything else is returned untouched and treated upstream as unexpected.
 */
export function toRequestError(err: unknown, url: string, timeoutMs: number): unknown {
  if (isAbort(err)) {
    return new TransportError(`Request to ${url} timed out after ${timeoutMs}ms`, { cause: err });
  }
  // undici reports DNS/connect failures as TypeError('fetch failed') with the socket error as cause
  if (err instanceof TypeError && err.cause !== undefined) {
    return new TransportError(err.message, { cause: err.cause });
  }
  return err;
}

export async function httpGet(url: string, options: GetOptions): Promise<HttpResponse> {
  const fetchFn = options.fetch ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  const start = performance.now();
  try {
    const res = await fetchFn(url, { headers: options.headers, signal: controller.signal, redirect: 'follow' });
    const body = await res.text();
    return { status: res.status, body, elapsedMs: performance.now() - start };
  } catch (err) {
    throw toRequestError(err, url, options.timeoutMs);
  } finally {
    clearTimeout(timer);
  }
}

export function parseJson(body: string, url: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    throw new ProtocolError(`Malformed JSON from ${url}`);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Upstream APIs send numbers as either JSON numbers or numeric strings. */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}
