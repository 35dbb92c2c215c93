/**
 * Webhook notification provider.
 * POSTs each event as JSON to the delivery layer. Delivery failures are
 * logged and otherwise dropped.
 */

import type { ILogProvider } from './ILogProvider.js';
import type { INotificationProvider, NotificationEvent } from './INotificationProvider.js';

export interface WebhookNotificationProviderOptions {
  url: string;
  logProvider: ILogProvider;
  /** Abort a delivery after this many ms. Default: 5000. */
  timeoutMs?: number;
}

export class WebhookNotificationProvider implements INotificationProvider {
  private readonly url: string;
  private readonly logProvider: ILogProvider;
  private readonly timeoutMs: number;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: WebhookNotificationProviderOptions) {
    this.url = options.url;
    this.logProvider = options.logProvider;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  notify(event: NotificationEvent): void {
    const delivery = this.deliver(event).finally(() => {
      this.inFlight.delete(delivery);
    });
    this.inFlight.add(delivery);
  }

  /** Wait for deliveries already handed off. Used on shutdown and in tests. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async deliver(event: NotificationEvent): Promise<void> {
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...event, sentAt: new Date().toISOString() }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        this.logProvider.warn('notification delivery rejected', {
          type: event.type,
          status: response.status,
        });
      }
    } catch (err) {
      this.logProvider.warn('notification delivery failed', {
        type: event.type,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
