import { Elysia } from 'elysia';
import type { DashboardStats } from '@cdn-monitor/shared';
import type { Store } from '../db';
import type { AppContext } from './context';

export function computeStats(store: Pick<Store, 'listServers' | 'getLatestMetric'>): DashboardStats {
  const stats: DashboardStats = {
    total_servers: 0,
    status_counts: { up: 0, down: 0, unknown: 0 },
    role_counts: { origin: 0, edge: 0, 'load-balancer': 0 },
    total_connections: 0,
  };

  for (const server of store.listServers()) {
    stats.total_servers++;
    stats.status_counts[server.status] = (stats.status_counts[server.status] ?? 0) + 1;
    stats.role_counts[server.role] = (stats.role_counts[server.role] ?? 0) + 1;
    stats.total_connections += store.getLatestMetric(server.id)?.active_connections ?? 0;
  }

  return stats;
}

export function statsRoutes({ store }: AppContext) {
  return new Elysia({ prefix: '/api/dashboard' })
    .get('/stats', () => computeStats(store));
}
