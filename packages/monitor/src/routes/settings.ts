import { Elysia, t } from 'elysia';
import { testWebhook } from '../services/discord';
import { describeError } from '../errors';
import type { AppContext } from './context';

const SCHEDULE_KEYS = new Set(['collection_interval_minutes', 'collection_concurrency']);

export function settingsRoutes({ store, monitor, fetch }: AppContext) {
  return new Elysia({ prefix: '/api/settings' })
    .get('/', () => {
      return { settings: store.getAllSettings() };
    })

    .put('/', ({ body }) => {
      store.setSetting(body.key, body.value);

      // Restart monitor if the schedule or worker cap changed
      if (SCHEDULE_KEYS.has(body.key) && monitor.isRunning()) {
        monitor.restart().catch(err => {
          console.error(`[Settings] Monitor restart failed: ${describeError(err)}`);
        });
      }

      return { ok: true };
    }, {
      body: t.Object({
        key: t.String(),
        value: t.String(),
      }),
    })

    .post('/test-webhook', async ({ body }) => {
      const success = await testWebhook(body.url, fetch);
      return { success };
    }, {
      body: t.Object({
        url: t.String(),
      }),
    });
}
