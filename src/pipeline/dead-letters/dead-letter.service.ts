import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Repository } from 'typeorm';
import { DeadLetter } from '../../database/entities/dead-letter.entity';

export interface DeadLetterListOptions {
  /** Hide envelopes whose replay already settled */
  pendingOnly?: boolean;
}

/**
 * DeadLetterService - durable failure queue
 *
 * Captures batches that exhausted their delivery budget. The original
 * locator is stored untouched so a replay processes exactly the batch
 * that failed.
 */
@Injectable()
export class DeadLetterService {
  private readonly logger = new Logger(DeadLetterService.name);

  constructor(
    @InjectRepository(DeadLetter)
    private readonly deadLetterRepository: Repository<DeadLetter>,
  ) {}

  async capture(
    batchLocator: string,
    attemptCount: number,
    lastError: string,
  ): Promise<DeadLetter> {
    const envelope = this.deadLetterRepository.create({
      originalBatchLocator: batchLocator,
      attemptCount,
      lastError,
      failedAt: new Date(),
      replayedAt: null,
    });
    const saved = await this.deadLetterRepository.save(envelope);

    this.logger.error(
      `Dead-lettered batch ${batchLocator} after ${attemptCount} attempts (${saved.id}): ${lastError}`,
    );
    return saved;
  }

  async list(options: DeadLetterListOptions = {}): Promise<DeadLetter[]> {
    return this.deadLetterRepository.find({
      where: options.pendingOnly ? { replayedAt: IsNull() } : {},
      order: { failedAt: 'DESC' },
    });
  }

  async findById(id: string): Promise<DeadLetter | null> {
    return this.deadLetterRepository.findOneBy({ id });
  }

  async markReplayed(envelope: DeadLetter): Promise<DeadLetter> {
    envelope.replayedAt = new Date();
    return this.deadLetterRepository.save(envelope);
  }
}
