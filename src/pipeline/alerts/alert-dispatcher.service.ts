import { Inject, Injectable, Logger } from '@nestjs/common';
import { toErrorMessage, withTimeout } from '../../common/async.utils';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/pipeline.config';
import { DispatchError } from '../interfaces/pipeline.errors';
import { AlertEvent, naturalKey } from '../interfaces/pipeline.types';
import { NotificationChannel } from './notification-channel';

export type DispatchResult =
  | { accepted: true }
  | { accepted: false; error: DispatchError };

/**
 * AlertDispatcher - hands alerts to the notification channel
 *
 * Never throws. A rejected or timed-out alert is logged and returned as
 * `accepted: false`; the caller counts it and moves on.
 */
@Injectable()
export class AlertDispatcher {
  private readonly logger = new Logger(AlertDispatcher.name);

  constructor(
    private readonly channel: NotificationChannel,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async notify(alert: AlertEvent): Promise<DispatchResult> {
    const key = naturalKey(alert);
    try {
      await withTimeout(
        this.channel.publish(alert),
        this.config.alertTimeoutMs,
        `alert ${key} via ${this.channel.name}`,
      );
      return { accepted: true };
    } catch (error) {
      const dispatchError = new DispatchError(
        key,
        toErrorMessage(error),
        error instanceof Error ? error : undefined,
      );
      this.logger.warn(dispatchError.message);
      return { accepted: false, error: dispatchError };
    }
  }
}
