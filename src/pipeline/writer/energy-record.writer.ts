import { Inject, Injectable, Logger } from '@nestjs/common';
import { chunkArray, toErrorMessage, withTimeout } from '../../common/async.utils';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/pipeline.config';
import { EnergyRecordRow, EnergyRecordStore } from '../../storage/energy-record.store';
import { RecordWriteError } from '../interfaces/pipeline.errors';
import { ClassifiedRecord, naturalKey } from '../interfaces/pipeline.types';

export type WriteOutcome =
  | {
      ok: true;
      record: ClassifiedRecord;
      /** Another record with the same key in the same call was written instead */
      superseded?: boolean;
    }
  | { ok: false; record: ClassifiedRecord; error: RecordWriteError };

/**
 * EnergyRecordWriter - idempotent durable writes
 *
 * Every write is an upsert keyed by (siteId, timestamp), so writing the same
 * record again leaves the store unchanged. Chunked writes are an
 * optimization only: when a chunk fails its rows are retried one at a time
 * and the outcome is reported per record.
 */
@Injectable()
export class EnergyRecordWriter {
  private readonly logger = new Logger(EnergyRecordWriter.name);

  constructor(
    private readonly store: EnergyRecordStore,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async upsert(record: ClassifiedRecord): Promise<WriteOutcome> {
    const key = naturalKey(record);
    try {
      await withTimeout(
        this.store.upsertRows([this.toRow(record)]),
        this.config.writeTimeoutMs,
        `upsert ${key}`,
      );
      return { ok: true, record };
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      return {
        ok: false,
        record,
        error: new RecordWriteError(key, toErrorMessage(error), cause),
      };
    }
  }

  /**
   * Write many records, one outcome per input record in input order.
   *
   * Records sharing a natural key are collapsed before writing (the last
   * one wins, as it would with sequential upserts). The records that lost
   * are reported with the surviving write's outcome and `superseded: true`.
   */
  async upsertMany(records: ClassifiedRecord[]): Promise<WriteOutcome[]> {
    const latestByKey = new Map<string, ClassifiedRecord>();
    for (const record of records) {
      latestByKey.set(naturalKey(record), record);
    }
    if (latestByKey.size < records.length) {
      this.logger.debug(
        `Collapsed ${records.length - latestByKey.size} duplicate keys before writing`,
      );
    }

    const outcomeByKey = new Map<string, WriteOutcome>();
    const unique = [...latestByKey.values()];

    for (const chunk of chunkArray(unique, this.config.writeChunkSize)) {
      try {
        await withTimeout(
          this.store.upsertRows(chunk.map((record) => this.toRow(record))),
          this.config.writeTimeoutMs,
          `upsert chunk of ${chunk.length}`,
        );
        for (const record of chunk) {
          outcomeByKey.set(naturalKey(record), { ok: true, record });
        }
      } catch (error) {
        this.logger.warn(
          `Chunk write of ${chunk.length} records failed (${toErrorMessage(error)}), retrying records individually`,
        );
        for (const record of chunk) {
          outcomeByKey.set(naturalKey(record), await this.upsert(record));
        }
      }
    }

    return records.map((record): WriteOutcome => {
      const outcome = outcomeByKey.get(naturalKey(record));
      if (!outcome) {
        throw new Error(`No write outcome for ${naturalKey(record)}`);
      }
      if (outcome.record === record) {
        return outcome;
      }
      return outcome.ok
        ? { ok: true, record, superseded: true }
        : { ok: false, record, error: outcome.error };
    });
  }

  private toRow(record: ClassifiedRecord): EnergyRecordRow {
    return {
      siteId: record.siteId,
      timestamp: new Date(record.timestamp),
      energyGeneratedKwh: record.energyGeneratedKwh,
      energyConsumedKwh: record.energyConsumedKwh,
      netEnergyKwh: record.netEnergyKwh,
      anomaly: record.anomaly,
    };
  }
}
