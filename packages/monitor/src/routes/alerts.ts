import { Elysia, t } from 'elysia';
import { parseId, parseLimit } from './context';
import type { AppContext } from './context';

export function alertRoutes({ store }: AppContext) {
  return new Elysia({ prefix: '/api/alerts' })
    .get('/', ({ query }) => {
      const acknowledged = query.acknowledged === 'all' ? undefined : query.acknowledged === 'true';
      return { alerts: store.getAlerts({ acknowledged, limit: parseLimit(query.limit, 20, 500) }) };
    }, {
      query: t.Object({
        acknowledged: t.Optional(t.String()),
        limit: t.Optional(t.String()),
      }),
    })

    // Acknowledging is what lets the same alert type fire again for the server.
    .put('/:id/acknowledge', ({ params, set }) => {
      const id = parseId(params.id);
      const alert = id === null ? null : store.getAlert(id);
      if (!alert) {
        set.status = 404;
        return { error: 'Alert not found' };
      }
      store.acknowledgeAlert(alert.id);
      return { ok: true, alert: store.getAlert(alert.id) };
    });
}
