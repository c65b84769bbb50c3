import { Elysia } from 'elysia';
import { node } from '@elysiajs/node';
import { DEFAULT_DASHBOARD_PORT } from '@cdn-monitor/shared';
import { createApp } from './app';
import { createStore } from './db';
import { Monitor } from './services/monitor';
import { DiscordNotifier } from './services/discord';
import { describeError } from './errors';

const PORT = parseInt(process.env.PORT || String(DEFAULT_DASHBOARD_PORT), 10);

const store = createStore(process.env.DB_PATH || 'monitor.db');
const notifier = new DiscordNotifier(store);
const monitor = new Monitor({ store, notifier });

new Elysia({ adapter: node() })
  .use(createApp({ store, monitor }))
  .listen(PORT);

console.log(`[Dashboard] Running at http://localhost:${PORT}`);

// First cycle runs immediately
monitor.start();

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[Dashboard] ${signal} received, waiting for the current cycle to finish`);
  await monitor.stop();
  await notifier.idle();
  store.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch(err => {
      console.error(`[Dashboard] Shutdown failed: ${describeError(err)}`);
      process.exit(1);
    });
  });
}
