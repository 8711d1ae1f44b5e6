import {
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { sleep, toErrorMessage } from '../common/async.utils';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { DeadLetter } from '../database/entities/dead-letter.entity';
import { BatchProcessorService } from './batch-processor.service';
import { DeadLetterService } from './dead-letters/dead-letter.service';
import { BatchProcessingError } from './interfaces/pipeline.errors';
import { BatchIntakeEvent, BatchResult } from './interfaces/pipeline.types';

export type DeliveryOutcome =
  | { outcome: 'settled'; attempts: number; result: BatchResult }
  | {
      outcome: 'dead_lettered';
      attempts: number;
      result: BatchResult | null;
      deadLetter: DeadLetter;
    };

/**
 * DeliveryService - at-least-once delivery of intake events
 *
 * Plays the role of the hosting platform's retry mechanism: a failed batch
 * is redelivered whole, with exponential backoff, until it settles or the
 * attempt budget is spent. After that the batch is dead-lettered.
 *
 * An event arriving with delivery_attempt > 1 (already retried upstream)
 * only gets the remainder of the budget.
 */
@Injectable()
export class DeliveryService {
  private readonly logger = new Logger(DeliveryService.name);

  constructor(
    private readonly processor: BatchProcessorService,
    private readonly deadLetters: DeadLetterService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async deliver(event: BatchIntakeEvent): Promise<DeliveryOutcome> {
    const maxAttempts = this.config.maxDeliveryAttempts;
    let attempt = event.deliveryAttempt;
    let lastError = 'unknown error';
    let lastResult: BatchResult | null = null;

    for (;;) {
      try {
        const result = await this.processor.process({
          batchLocator: event.batchLocator,
          deliveryAttempt: attempt,
        });
        return { outcome: 'settled', attempts: attempt, result };
      } catch (error) {
        lastError = toErrorMessage(error);
        lastResult = error instanceof BatchProcessingError ? error.result : null;

        if (attempt >= maxAttempts) {
          break;
        }

        const delay = this.config.retryBaseDelayMs * Math.pow(2, attempt - 1);
        this.logger.warn(
          `Batch ${event.batchLocator} failed (attempt ${attempt}/${maxAttempts}): ${lastError}. Redelivering in ${delay}ms`,
        );
        await sleep(delay);
        attempt++;
      }
    }

    const deadLetter = await this.deadLetters.capture(
      event.batchLocator,
      attempt,
      lastError,
    );
    if (lastResult) {
      lastResult.state = 'DEAD_LETTERED';
      lastResult.transitions.push('DEAD_LETTERED');
    }
    return {
      outcome: 'dead_lettered',
      attempts: attempt,
      result: lastResult,
      deadLetter,
    };
  }

  /**
   * Redeliver a dead-lettered batch from attempt 1, unchanged.
   * The envelope is marked replayed only when the batch settles; a failing
   * replay produces a new envelope and leaves this one pending.
   */
  async replay(deadLetterId: string): Promise<DeliveryOutcome> {
    const envelope = await this.deadLetters.findById(deadLetterId);
    if (!envelope) {
      throw new NotFoundException(`Dead letter not found: ${deadLetterId}`);
    }

    this.logger.log(
      `Replaying dead letter ${envelope.id} (${envelope.originalBatchLocator})`,
    );
    const outcome = await this.deliver({
      batchLocator: envelope.originalBatchLocator,
      deliveryAttempt: 1,
    });

    if (outcome.outcome === 'settled') {
      await this.deadLetters.markReplayed(envelope);
    }
    return outcome;
  }
}
