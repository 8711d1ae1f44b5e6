import {
  Controller,
  Get,
  Param,
  Query,
  Logger,
  BadRequestException,
} from '@nestjs/common';
import { parseIsoInstant } from '../common/date.utils';
import {
  EnergyRecordResponse,
  RecordRange,
  RecordsService,
  SummaryResponse,
} from './records.service';

/**
 * Query parameters for the per-site records endpoint
 */
interface RecordsQuery {
  start?: string;
  end?: string;
}

/**
 * RecordsController
 *
 * Read-only view over stored energy records.
 *
 * Endpoints:
 * - GET /summary - Totals across all sites
 * - GET /records/:siteId - Records for a site, optionally bounded by [start, end)
 * - GET /anomalies/:siteId - Anomalous records for a site
 */
@Controller()
export class RecordsController {
  private readonly logger = new Logger(RecordsController.name);

  constructor(private readonly recordsService: RecordsService) {}

  @Get('summary')
  async getSummary(): Promise<SummaryResponse> {
    return this.recordsService.getSummary();
  }

  /**
   * @example
   * GET /records/site-alpha
   * GET /records/site-alpha?start=2025-06-20T00:00:00Z&end=2025-06-21T00:00:00Z
   */
  @Get('records/:siteId')
  async getRecords(
    @Param('siteId') siteId: string,
    @Query() query: RecordsQuery,
  ): Promise<EnergyRecordResponse[]> {
    this.logger.log(
      `GET /records/${siteId} with query: ${JSON.stringify(query)}`,
    );

    const range = parseRange(query);
    const records = await this.recordsService.findBySite(siteId, range);

    this.logger.log(`Returning ${records.length} records`);
    return records;
  }

  @Get('anomalies/:siteId')
  async getAnomalies(
    @Param('siteId') siteId: string,
  ): Promise<EnergyRecordResponse[]> {
    this.logger.log(`GET /anomalies/${siteId}`);
    return this.recordsService.findAnomalies(siteId);
  }
}

function parseBound(name: 'start' | 'end', value: unknown): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === 'string' ? parseIsoInstant(value) : null;
  if (!parsed) {
    throw new BadRequestException(
      `Invalid ${name} date: ${String(value)}. Expected an ISO-8601 instant such as 2025-06-20T00:00:00Z`,
    );
  }
  return parsed;
}

function parseRange(query: RecordsQuery): RecordRange {
  const start = parseBound('start', query.start);
  const end = parseBound('end', query.end);
  if (start && end && start.getTime() > end.getTime()) {
    throw new BadRequestException('start must not be after end');
  }
  return { start, end };
}
