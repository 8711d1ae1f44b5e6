import { Injectable, Logger } from '@nestjs/common';
import { toErrorMessage } from '../common/async.utils';
import { AlertDispatcher } from './alerts/alert-dispatcher.service';
import { BatchSource } from './batch-source/batch-source';
import { AnomalyClassifier } from './classification/anomaly.classifier';
import {
  BatchProcessingError,
  ClassificationError,
} from './interfaces/pipeline.errors';
import {
  AlertEvent,
  BatchIntakeEvent,
  BatchResult,
  BatchState,
  ClassifiedRecord,
  ValidatedReading,
} from './interfaces/pipeline.types';
import { ReadingValidator } from './validation/reading.validator';
import { EnergyRecordWriter } from './writer/energy-record.writer';

/**
 * BatchProcessorService - runs one delivery attempt of one batch
 *
 * Responsibilities:
 * 1. Fetch: resolve the locator through the BatchSource
 * 2. Validate: drop malformed entries, count them (skip-and-count)
 * 3. Classify: derive net energy and the anomaly flag
 * 4. Write: idempotent upsert of every record
 * 5. Alert: one alert per anomalous record, only after its write succeeded
 *
 * Any write failure fails the whole batch with BatchProcessingError so the
 * caller redelivers the entire original batch.
 *
 * Stateless between calls; concurrent batches share nothing here.
 */
@Injectable()
export class BatchProcessorService {
  private readonly logger = new Logger(BatchProcessorService.name);

  constructor(
    private readonly batchSource: BatchSource,
    private readonly validator: ReadingValidator,
    private readonly classifier: AnomalyClassifier,
    private readonly writer: EnergyRecordWriter,
    private readonly alertDispatcher: AlertDispatcher,
  ) {}

  /**
   * Process a batch once.
   *
   * @returns the settled result
   * @throws BatchProcessingError carrying the partial result on failure
   */
  async process(event: BatchIntakeEvent): Promise<BatchResult> {
    const startTime = Date.now();
    const result: BatchResult = {
      batchLocator: event.batchLocator,
      deliveryAttempt: event.deliveryAttempt,
      state: 'RECEIVED',
      transitions: ['RECEIVED'],
      recordsReceived: 0,
      recordsValid: 0,
      recordsSkipped: 0,
      recordsUnclassifiable: 0,
      recordsWritten: 0,
      recordsFailed: 0,
      anomalies: 0,
      alertsSent: 0,
      alertsFailed: 0,
      errors: [],
      durationMs: 0,
    };

    const transition = (state: BatchState): void => {
      result.state = state;
      result.transitions.push(state);
      this.logger.debug(`${event.batchLocator} -> ${state}`);
    };

    this.logger.log(
      `Processing batch ${event.batchLocator} (attempt ${event.deliveryAttempt})`,
    );

    try {
      const payload = await this.batchSource.fetch(event.batchLocator);

      transition('VALIDATING');
      const validation = this.validator.validateBatch(payload);
      result.recordsReceived = validation.results.length;
      result.recordsValid = validation.valid.length;
      result.recordsSkipped = validation.skipped;
      for (const rejected of validation.results) {
        if (!rejected.ok) {
          result.errors.push(`Entry ${rejected.index}: ${rejected.errors.join('; ')}`);
        }
      }
      if (validation.skipped > 0) {
        this.logger.warn(
          `Skipped ${validation.skipped}/${validation.results.length} malformed entries in ${event.batchLocator}`,
        );
      }

      transition('CLASSIFYING');
      const records = this.classifyAll(validation.valid, result);

      transition('WRITING');
      const outcomes = await this.writer.upsertMany(records);
      let firstWriteError: Error | undefined;

      for (const outcome of outcomes) {
        if (!outcome.ok) {
          result.recordsFailed++;
          result.errors.push(outcome.error.message);
          firstWriteError ??= outcome.error;
          continue;
        }

        result.recordsWritten++;
        if (!outcome.record.anomaly || outcome.superseded) {
          continue;
        }

        // Alerts only follow a successful write
        result.anomalies++;
        const dispatch = await this.alertDispatcher.notify(
          this.toAlert(outcome.record),
        );
        if (dispatch.accepted) {
          result.alertsSent++;
        } else {
          result.alertsFailed++;
        }
      }

      if (result.recordsFailed > 0) {
        throw new BatchProcessingError(
          `${result.recordsFailed} of ${outcomes.length} records failed to write`,
          result,
          firstWriteError,
        );
      }

      transition('SETTLED');
      result.durationMs = Date.now() - startTime;
      this.logger.log(
        `Batch ${event.batchLocator} settled: ${result.recordsWritten}/${result.recordsReceived} records written, ` +
          `${result.recordsSkipped} skipped, ${result.anomalies} anomalies, ` +
          `${result.alertsSent} alerts sent in ${result.durationMs}ms`,
      );
      return result;
    } catch (error) {
      transition('FAILED');
      result.durationMs = Date.now() - startTime;

      const failure =
        error instanceof BatchProcessingError
          ? error
          : new BatchProcessingError(
              toErrorMessage(error),
              result,
              error instanceof Error ? error : undefined,
            );
      if (!(error instanceof BatchProcessingError)) {
        result.errors.push(failure.message);
      }

      this.logger.error(
        `Batch ${event.batchLocator} failed on attempt ${event.deliveryAttempt}: ${failure.message}`,
      );
      throw failure;
    }
  }

  /**
   * Classify every reading. A ClassificationError drops that record only;
   * anything else is a bug and fails the batch.
   */
  private classifyAll(
    readings: ValidatedReading[],
    result: BatchResult,
  ): ClassifiedRecord[] {
    const records: ClassifiedRecord[] = [];

    for (const reading of readings) {
      try {
        const classification = this.classifier.classify(
          reading.energyGeneratedKwh,
          reading.energyConsumedKwh,
        );
        records.push({
          siteId: reading.siteId,
          timestamp: reading.timestamp,
          energyGeneratedKwh: reading.energyGeneratedKwh,
          energyConsumedKwh: reading.energyConsumedKwh,
          netEnergyKwh: classification.netEnergyKwh,
          anomaly: classification.anomaly,
          anomalyReason: classification.reason,
        });
      } catch (error) {
        if (!(error instanceof ClassificationError)) {
          throw error;
        }
        result.recordsUnclassifiable++;
        result.errors.push(`${reading.siteId}@${reading.timestamp}: ${error.message}`);
        this.logger.error(error.message);
      }
    }

    return records;
  }

  private toAlert(record: ClassifiedRecord): AlertEvent {
    return {
      siteId: record.siteId,
      timestamp: record.timestamp,
      energyGeneratedKwh: record.energyGeneratedKwh,
      energyConsumedKwh: record.energyConsumedKwh,
      netEnergyKwh: record.netEnergyKwh,
      reason: record.anomalyReason ?? 'flagged as anomalous',
    };
  }
}
