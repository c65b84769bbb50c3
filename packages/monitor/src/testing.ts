import { vi } from 'vitest';
import type { RegisterServerRequest, Server } from '@cdn-monitor/shared';
import type { Store } from './db';
import type { FetchFn } from './services/http';

type Handler = Response | Error | ((init?: RequestInit) => Response | Promise<Response>);

/** An undici-style DNS failure, as thrown by fetch for an unknown host. */
export function dnsFailure(host: string): TypeError {
  return new TypeError('fetch failed', { cause: new Error(`getaddrinfo ENOTFOUND ${host}`) });
}

/**
 * Fake fetch keyed by exact URL. Unknown URLs fail like an unresolvable host.
 */
export function fakeFetch(routes: Record<string, Handler>) {
  return vi.fn<FetchFn>(async (url, init) => {
    const handler = routes[url];
    if (handler === undefined) throw dnsFailure(new URL(url).hostname);
    if (handler instanceof Error) throw handler;
    if (handler instanceof Response) return handler.clone();
    return handler(init);
  });
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

export function text(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/plain' } });
}

export function addServer(store: Store, overrides: Partial<RegisterServerRequest> & { hostname: string }): Server {
  return store.createServer({
    ip_address: '10.0.0.1',
    port: 8080,
    role: 'edge',
    api_type: 'generic',
    ...overrides,
  });
}

export function serverFixture(overrides: Partial<Server> = {}): Server {
  return {
    id: 1,
    hostname: 'edge-1',
    ip_address: '10.0.0.1',
    port: 8080,
    role: 'edge',
    status: 'unknown',
    api_endpoint: null,
    api_type: 'generic',
    api_token: null,
    api_username: null,
    api_password: null,
    created_at: 0,
    updated_at: 0,
    ...overrides,
  };
}
