import { Logger } from '@nestjs/common';
import { AlertEvent } from '../interfaces/pipeline.types';
import { NotificationChannel, toAlertPayload } from './notification-channel';

/**
 * HTTP channel: POSTs each alert as JSON to a fan-out endpoint.
 *
 * Stateless; each alert is an independent request. Any non-2xx response
 * counts as rejection. Requests are aborted after `timeoutMs`.
 */
export class WebhookNotificationChannel extends NotificationChannel {
  private readonly logger = new Logger(WebhookNotificationChannel.name);

  readonly name = 'webhook';

  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
  ) {
    super();
    this.logger.log(`WebhookNotificationChannel configured with URL: ${this.url}`);
  }

  async publish(alert: AlertEvent): Promise<void> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(toAlertPayload(alert)),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Webhook responded with ${response.status}`);
    }

    this.logger.debug(`Alert for ${alert.siteId} at ${alert.timestamp} accepted`);
  }
}
