import { describe, it, expect, vi, beforeEach } from 'vitest';
import { collectNginx, parseStubStatus } from './nginx';
import { ProtocolError } from '../errors';
import { fakeFetch, text } from '../testing';

const STUB_STATUS = [
  'Active connections: 291 ',
  'server accepts handled requests',
  ' 16630948 16630948 31070465 ',
  'Reading: 6 Writing: 179 Waiting: 106',
].join('\n');

describe('parseStubStatus', () => {
  it('reads the active connections line', () => {
    expect(parseStubStatus(STUB_STATUS)).toBe(291);
  });

  it('falls back to the first counters line without a label', () => {
    expect(parseStubStatus('server accepts handled requests\n 42 42 97\n')).toBe(42);
  });

  it('returns undefined when nothing matches', () => {
    expect(parseStubStatus('hello world')).toBeUndefined();
  });

  it('rejects a non-numeric active connections value', () => {
    expect(() => parseStubStatus('Active connections: many')).toThrow(ProtocolError);
  });
});

describe('collectNginx', () => {
  const endpoint = 'http://edge-2.test/nginx_status';
  const ctx = (fetch: ReturnType<typeof fakeFetch>) => ({
    hostname: 'edge-2',
    headers: {},
    timeoutMs: 1000,
    enrichmentTimeoutMs: 500,
    fetch,
  });

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('fetches the endpoint as given and reads connections', async () => {
    const fetch = fakeFetch({ [endpoint]: text(STUB_STATUS) });

    const metrics = await collectNginx(endpoint, ctx(fetch));

    expect(metrics).toEqual({
      activeConnections: 291,
      hlsConnections: 0,
      errorCount: 0,
      responseTimeMs: expect.any(Number),
    });
  });

  it('returns defaults on a non-200 response', async () => {
    const fetch = fakeFetch({ [endpoint]: text('forbidden', 403) });

    expect(await collectNginx(endpoint, ctx(fetch))).toEqual({ activeConnections: 0, hlsConnections: 0, errorCount: 0 });
  });
});
