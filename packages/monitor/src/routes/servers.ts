import { Elysia, t } from 'elysia';
import type { PublicServer, Server } from '@cdn-monitor/shared';
import { probeServer } from '../services/probe';
import { parseId, parseLimit, parseTime } from './context';
import type { AppContext } from './context';

const DAY_MS = 24 * 60 * 60 * 1000;
// One day of samples at the default 5 minute cadence
const DEFAULT_METRIC_LIMIT = 288;

const roleSchema = t.Union([t.Literal('origin'), t.Literal('edge'), t.Literal('load-balancer')]);
const dialectSchema = t.Union([t.Literal('srs'), t.Literal('nginx'), t.Literal('generic')]);
const optionalText = t.Optional(t.Union([t.String(), t.Null()]));

const serverBody = t.Object({
  hostname: t.String(),
  ip_address: t.String(),
  port: t.Optional(t.Integer({ minimum: 1, maximum: 65535 })),
  role: roleSchema,
  api_endpoint: optionalText,
  api_type: t.Optional(dialectSchema),
  api_token: optionalText,
  api_username: optionalText,
  api_password: optionalText,
});

export function toPublicServer(server: Server): PublicServer {
  const { api_token: _token, api_username: _username, api_password: _password, ...rest } = server;
  return rest;
}

export function serverRoutes({ store, fetch }: AppContext) {
  return new Elysia({ prefix: '/api/servers' })
    .get('/', () => {
      const servers = store.listServers().map(server => ({
        ...toPublicServer(server),
        latest_metric: store.getLatestMetric(server.id),
      }));
      return { servers };
    })

    .post('/', async ({ body, set }) => {
      const hostname = body.hostname.trim();
      const ipAddress = body.ip_address.trim();
      if (!hostname || !ipAddress) {
        set.status = 400;
        return { error: 'Hostname and IP address are required' };
      }
      if (store.getServerByHostname(hostname)) {
        set.status = 409;
        return { error: `Server with hostname ${hostname} already exists` };
      }

      const created = store.createServer({
        ...body,
        hostname,
        ip_address: ipAddress,
        api_endpoint: body.api_endpoint?.trim() || null,
      });
      const probe = await probeServer(created, store, { fetch });
      const server = store.getServer(created.id) ?? created;

      set.status = 201;
      return { server: toPublicServer(server), probe };
    }, {
      body: serverBody,
    })

    .get('/:id', ({ params, set }) => {
      const id = parseId(params.id);
      const server = id === null ? null : store.getServer(id);
      if (!server) {
        set.status = 404;
        return { error: 'Server not found' };
      }
      return {
        server: toPublicServer(server),
        latest_metric: store.getLatestMetric(server.id),
        alerts: store.getAlerts({ serverId: server.id, acknowledged: false }),
      };
    })

    // Saves the new fields, then re-probes with them.
    .put('/:id', async ({ params, body, set }) => {
      const id = parseId(params.id);
      const existing = id === null ? null : store.getServer(id);
      if (!existing) {
        set.status = 404;
        return { error: 'Server not found' };
      }

      const hostname = body.hostname.trim();
      const ipAddress = body.ip_address.trim();
      if (!hostname || !ipAddress) {
        set.status = 400;
        return { error: 'Hostname and IP address are required' };
      }
      const clash = store.getServerByHostname(hostname);
      if (clash && clash.id !== existing.id) {
        set.status = 409;
        return { error: `Server with hostname ${hostname} already exists` };
      }

      const updated = store.updateServer(existing.id, {
        ...body,
        hostname,
        ip_address: ipAddress,
        api_endpoint: body.api_endpoint?.trim() || null,
      });
      if (!updated) {
        set.status = 404;
        return { error: 'Server not found' };
      }
      const probe = await probeServer(updated, store, { fetch });
      const server = store.getServer(updated.id) ?? updated;
      return { server: toPublicServer(server), probe };
    }, {
      body: serverBody,
    })

    .delete('/:id', ({ params, set }) => {
      const id = parseId(params.id);
      if (id === null || !store.deleteServer(id)) {
        set.status = 404;
        return { error: 'Server not found' };
      }
      return { ok: true };
    })

    .post('/:id/test', async ({ params, set }) => {
      const id = parseId(params.id);
      const server = id === null ? null : store.getServer(id);
      if (!server) {
        set.status = 404;
        return { error: 'Server not found' };
      }
      const probe = await probeServer(server, store, { fetch });
      return { hostname: server.hostname, ...probe };
    })

    .get('/:id/metrics', ({ params, query, set }) => {
      const id = parseId(params.id);
      const server = id === null ? null : store.getServer(id);
      if (!server) {
        set.status = 404;
        return { error: 'Server not found' };
      }

      const since = parseTime(query.since);
      const until = parseTime(query.until);
      if (since === null || until === null) {
        set.status = 400;
        return { error: 'since/until must be epoch milliseconds or an ISO date' };
      }

      const metrics = store.getMetrics(server.id, {
        since: since ?? Date.now() - DAY_MS,
        until,
        limit: parseLimit(query.limit, DEFAULT_METRIC_LIMIT, 10_000),
      });
      return { server_id: server.id, metrics };
    }, {
      query: t.Object({
        since: t.Optional(t.String()),
        until: t.Optional(t.String()),
        limit: t.Optional(t.String()),
      }),
    });
}
