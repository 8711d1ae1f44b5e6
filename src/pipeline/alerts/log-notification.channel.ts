import { Logger } from '@nestjs/common';
import { AlertEvent } from '../interfaces/pipeline.types';
import { NotificationChannel, toAlertPayload } from './notification-channel';

/**
 * Writes alerts to the application log. Default channel for local runs.
 */
export class LogNotificationChannel extends NotificationChannel {
  private readonly logger = new Logger(LogNotificationChannel.name);

  readonly name = 'log';

  publish(alert: AlertEvent): Promise<void> {
    const payload = toAlertPayload(alert);
    this.logger.warn(
      `${payload.subject} at ${payload.timestamp}: generated=${payload.energy_generated_kwh} kWh, ` +
        `consumed=${payload.energy_consumed_kwh} kWh, net=${payload.net_energy_kwh} kWh (${payload.reason})`,
    );
    return Promise.resolve();
  }
}
