import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { EnergyRecord } from '../database/entities/energy-record.entity';
import {
  EnergyRecordRow,
  EnergyRecordStore,
  SiteAggregate,
  SiteRecordQuery,
} from './energy-record.store';

/**
 * PostgreSQL-backed EnergyRecordStore.
 */
@Injectable()
export class TypeOrmEnergyRecordStore extends EnergyRecordStore {
  private readonly logger = new Logger(TypeOrmEnergyRecordStore.name);

  constructor(
    @InjectRepository(EnergyRecord)
    private readonly energyRecordRepository: Repository<EnergyRecord>,
  ) {
    super();
  }

  /**
   * Insert with upsert (ON CONFLICT DO UPDATE)
   * Composite PK ensures no duplicates, updates existing records.
   * createdAt is left out of the update list so a rewrite keeps it.
   */
  async upsertRows(rows: EnergyRecordRow[]): Promise<void> {
    if (rows.length === 0) return;

    const values: QueryDeepPartialEntity<EnergyRecord>[] = rows.map((row) => ({
      siteId: row.siteId,
      timestamp: row.timestamp,
      energyGeneratedKwh: row.energyGeneratedKwh,
      energyConsumedKwh: row.energyConsumedKwh,
      netEnergyKwh: row.netEnergyKwh,
      anomaly: row.anomaly,
    }));

    await this.energyRecordRepository
      .createQueryBuilder()
      .insert()
      .into(EnergyRecord)
      .values(values)
      .orUpdate(
        ['energyGeneratedKwh', 'energyConsumedKwh', 'netEnergyKwh', 'anomaly'],
        ['siteId', 'timestamp'],
      )
      .execute();

    this.logger.debug(`Upserted ${rows.length} energy records`);
  }

  async findBySite(
    siteId: string,
    query: SiteRecordQuery = {},
  ): Promise<EnergyRecordRow[]> {
    const builder = this.energyRecordRepository
      .createQueryBuilder('record')
      .where('record.siteId = :siteId', { siteId });

    if (query.start) {
      builder.andWhere('record.timestamp >= :start', { start: query.start });
    }
    if (query.end) {
      builder.andWhere('record.timestamp < :end', { end: query.end });
    }
    if (query.anomaliesOnly) {
      builder.andWhere('record.anomaly = :anomaly', { anomaly: true });
    }

    return builder.orderBy('record.timestamp', 'ASC').getMany();
  }

  /**
   * Full scan grouped by site.
   */
  async aggregateBySite(): Promise<SiteAggregate[]> {
    const rows = await this.energyRecordRepository
      .createQueryBuilder('record')
      .select('record.siteId', 'siteId')
      .addSelect('COUNT(*)', 'totalRecords')
      .addSelect('COUNT(*) FILTER (WHERE record.anomaly)', 'anomalyCount')
      .groupBy('record.siteId')
      .orderBy('record.siteId', 'ASC')
      .getRawMany<{
        siteId: string;
        totalRecords: string | number;
        anomalyCount: string | number;
      }>();

    // pg returns COUNT(*) as a string (bigint)
    return rows.map((row) => ({
      siteId: row.siteId,
      totalRecords: Number(row.totalRecords),
      anomalyCount: Number(row.anomalyCount),
    }));
  }
}
