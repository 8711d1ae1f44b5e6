import {
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { toErrorMessage } from '../common/async.utils';
import {
  EnergyRecordRow,
  EnergyRecordStore,
  SiteRecordQuery,
} from '../storage/energy-record.store';

/**
 * EnergyRecord as served over HTTP
 */
export interface EnergyRecordResponse {
  site_id: string;
  timestamp: string;
  energy_generated_kwh: number;
  energy_consumed_kwh: number;
  net_energy_kwh: number;
  anomaly: boolean;
}

export interface SummaryResponse {
  total_records: number;
  anomaly_count: number;
  site_ids: string[];
  total_sites: number;
  /** Anomaly count per site; sites without anomalies are omitted */
  site_anomaly_distribution: Record<string, number>;
}

export interface RecordRange {
  start?: Date;
  end?: Date;
}

@Injectable()
export class RecordsService {
  private readonly logger = new Logger(RecordsService.name);

  constructor(private readonly store: EnergyRecordStore) {}

  async findBySite(
    siteId: string,
    range: RecordRange = {},
  ): Promise<EnergyRecordResponse[]> {
    const rows = await this.read(`records for ${siteId}`, () =>
      this.store.findBySite(siteId, range),
    );
    return rows.map(toEnergyRecordResponse);
  }

  async findAnomalies(siteId: string): Promise<EnergyRecordResponse[]> {
    const query: SiteRecordQuery = { anomaliesOnly: true };
    const rows = await this.read(`anomalies for ${siteId}`, () =>
      this.store.findBySite(siteId, query),
    );
    return rows.map(toEnergyRecordResponse);
  }

  async getSummary(): Promise<SummaryResponse> {
    const aggregates = await this.read('summary', () =>
      this.store.aggregateBySite(),
    );

    let totalRecords = 0;
    let anomalyCount = 0;
    for (const aggregate of aggregates) {
      totalRecords += aggregate.totalRecords;
      anomalyCount += aggregate.anomalyCount;
    }
    // Site ids are arbitrary strings, including "__proto__"
    const distribution: Record<string, number> = Object.fromEntries(
      aggregates
        .filter((aggregate) => aggregate.anomalyCount > 0)
        .map((aggregate) => [aggregate.siteId, aggregate.anomalyCount]),
    );

    return {
      total_records: totalRecords,
      anomaly_count: anomalyCount,
      site_ids: aggregates.map((aggregate) => aggregate.siteId),
      total_sites: aggregates.length,
      site_anomaly_distribution: distribution,
    };
  }

  private async read<T>(what: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      this.logger.error(`Failed to read ${what}: ${toErrorMessage(error)}`);
      throw new InternalServerErrorException('Failed to read energy records');
    }
  }
}

export function toEnergyRecordResponse(
  row: EnergyRecordRow,
): EnergyRecordResponse {
  return {
    site_id: row.siteId,
    timestamp: row.timestamp.toISOString(),
    energy_generated_kwh: row.energyGeneratedKwh,
    energy_consumed_kwh: row.energyConsumedKwh,
    net_energy_kwh: row.netEnergyKwh,
    anomaly: row.anomaly,
  };
}
