import { SEVERITY_COLORS, STATUS_LABELS } from '@cdn-monitor/shared';
import type { Alert, Server } from '@cdn-monitor/shared';
import type { Store } from '../db';
import { describeError } from '../errors';
import type { FetchFn } from './http';
import type { Notifier } from './notifier';

type QueueItem =
  | { kind: 'alert'; alert: Alert; server: Server }
  | { kind: 'server_down'; server: Server };

interface Embed {
  title: string;
  description: string;
  color: number;
  fields: { name: string; value: string; inline: boolean }[];
  timestamp: string;
}

export interface DiscordOptions {
  fetch?: FetchFn;
  /** Minimum spacing between webhook posts. */
  minIntervalMs?: number;
}

export function buildEmbed(item: QueueItem): Embed {
  const { server } = item;
  if (item.kind === 'server_down') {
    return {
      title: `Server Down: ${server.hostname}`,
      description: `${server.hostname} (${server.ip_address}) is not responding`,
      color: SEVERITY_COLORS.critical,
      fields: [
        { name: 'Address', value: `${server.ip_address}:${server.port}`, inline: true },
        { name: 'Role', value: server.role, inline: true },
        { name: 'Status', value: STATUS_LABELS[server.status] ?? server.status, inline: true },
      ],
      timestamp: new Date(server.updated_at).toISOString(),
    };
  }

  const { alert } = item;
  return {
    title: `Alert: ${alert.alert_type.replace(/_/g, ' ').toUpperCase()}`,
    description: alert.message,
    color: SEVERITY_COLORS[alert.severity],
    fields: [
      { name: 'Server', value: server.hostname, inline: true },
      { name: 'Severity', value: alert.severity, inline: true },
      { name: 'Status', value: alert.acknowledged ? 'Acknowledged' : 'Active', inline: true },
    ],
    timestamp: new Date(alert.created_at).toISOString(),
  };
}

/**
 * Posts notifications to a Discord webhook from a queue, spacing sends and
 * backing off when Discord answers 429. Disabled unless `discord_enabled` is
 * 'true' and a webhook URL is set.
 */
export class DiscordNotifier implements Notifier {
  private queue: QueueItem[] = [];
  private processing: Promise<void> | null = null;
  private backoffMs = 0;
  private readonly fetchFn: FetchFn;
  private readonly minIntervalMs: number;

  constructor(
    private readonly store: Pick<Store, 'getSetting' | 'markAlertNotified'>,
    options: DiscordOptions = {},
  ) {
    this.fetchFn = options.fetch ?? fetch;
    this.minIntervalMs = options.minIntervalMs ?? 2000;
  }

  serverDown(server: Server): void {
    this.enqueue({ kind: 'server_down', server });
  }

  alertRaised(alert: Alert, server: Server): void {
    this.enqueue({ kind: 'alert', alert, server });
  }

  /** Resolves once the queue has drained. */
  idle(): Promise<void> {
    return this.processing ?? Promise.resolve();
  }

  private enqueue(item: QueueItem): void {
    const enabled = this.store.getSetting('discord_enabled');
    const url = this.store.getSetting('discord_webhook_url');
    if (enabled !== 'true' || !url) return;
    this.queue.push(item);
    if (!this.processing) {
      this.processing = this.processQueue().finally(() => {
        this.processing = null;
      });
    }
  }

  private async processQueue(): Promise<void> {
    let item = this.queue.shift();
    while (item) {
      if (this.backoffMs > 0) {
        await sleep(this.backoffMs);
        this.backoffMs = 0;
      }
      try {
        const delivered = await this.sendWebhook(item);
        if (delivered && item.kind === 'alert') {
          this.store.markAlertNotified(item.alert.id);
        }
      } catch (err) {
        console.error(`[Discord] Failed to send webhook: ${describeError(err)}`);
      }
      if (this.minIntervalMs > 0) await sleep(this.minIntervalMs);
      item = this.queue.shift();
    }
  }

  private async sendWebhook(item: QueueItem): Promise<boolean> {
    const url = this.store.getSetting('discord_webhook_url');
    if (!url) return false;

    const res = await this.fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ embeds: [buildEmbed(item)] }),
    });

    if (res.status === 429) {
      const retry = res.headers.get('Retry-After');
      this.backoffMs = retry ? parseFloat(retry) * 1000 : 5000;
      this.queue.unshift(item); // re-queue
      return false;
    }
    if (!res.ok) {
      console.error(`[Discord] Webhook returned ${res.status}`);
      return false;
    }
    return true;
  }
}

export async function testWebhook(url: string, fetchFn: FetchFn = fetch): Promise<boolean> {
  try {
    const res = await fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        embeds: [{
          title: 'CDN Monitor - Test',
          description: 'Webhook is working correctly!',
          color: SEVERITY_COLORS.recovery,
          timestamp: new Date().toISOString(),
        }],
      }),
    });
    return res.ok;
  } catch (err) {
    console.error(`[Discord] Test webhook failed: ${describeError(err)}`);
    return false;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
