/**
 * Row shape exchanged with the durable store.
 */
export interface EnergyRecordRow {
  siteId: string;
  timestamp: Date;
  energyGeneratedKwh: number;
  energyConsumedKwh: number;
  netEnergyKwh: number;
  anomaly: boolean;
}

/**
 * Filter for per-site reads. The range is half-open: [start, end).
 */
export interface SiteRecordQuery {
  start?: Date;
  end?: Date;
  anomaliesOnly?: boolean;
}

export interface SiteAggregate {
  siteId: string;
  totalRecords: number;
  anomalyCount: number;
}

/**
 * EnergyRecordStore - keyed time-series storage for energy records
 *
 * Contract:
 * - `upsertRows` is all-or-nothing for the rows it receives and overwrites
 *   any existing row with the same (siteId, timestamp)
 * - `findBySite` returns rows ordered by timestamp ascending
 * - `aggregateBySite` scans the whole store, one entry per site, sorted by siteId
 *
 * Used as the DI token; the TypeORM implementation is bound in StorageModule.
 */
export abstract class EnergyRecordStore {
  abstract upsertRows(rows: EnergyRecordRow[]): Promise<void>;

  abstract findBySite(
    siteId: string,
    query?: SiteRecordQuery,
  ): Promise<EnergyRecordRow[]>;

  abstract aggregateBySite(): Promise<SiteAggregate[]>;
}
