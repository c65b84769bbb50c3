import { Elysia } from 'elysia';
import { cors } from '@elysiajs/cors';
import { serverRoutes } from './routes/servers';
import { alertRoutes } from './routes/alerts';
import { statsRoutes } from './routes/stats';
import { settingsRoutes } from './routes/settings';
import type { AppContext } from './routes/context';

export function createApp(ctx: AppContext) {
  return new Elysia()
    .use(cors({
      credentials: true,
    }))
    .use(serverRoutes(ctx))
    .use(alertRoutes(ctx))
    .use(statsRoutes(ctx))
    .use(settingsRoutes(ctx));
}

export type App = ReturnType<typeof createApp>;
