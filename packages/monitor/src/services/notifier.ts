import type { Alert, Server } from '@cdn-monitor/shared';

/** Called by the monitor after each cycle; delivery is up to the implementation. */
export interface Notifier {
  /** The server's status moved to `down` during this cycle. */
  serverDown(server: Server): void;
  /** A critical or error alert was just created. */
  alertRaised(alert: Alert, server: Server): void;
}

export function shouldNotify(alert: Pick<Alert, 'severity'>): boolean {
  return alert.severity === 'critical' || alert.severity === 'error';
}
