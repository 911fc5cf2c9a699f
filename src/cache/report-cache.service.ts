/**
 * Batch Report Cache
 *
 * The queue worker stores each finished BatchReport here so the API layer
 * can poll by batch id. Redis only: reports are written once and read a
 * handful of times, so there is no in-process layer.
 *
 *   key   batch-report:<batchId>
 *   TTL   ingestion.reportTtlSeconds (24 h default)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RedisService } from '../redis/redis.service';
import { loadIngestionConfig, type IngestionConfig } from '../config/ingestion.config';
import type { BatchReport } from '../modules/ingestion/ingestion.service';

const REDIS_PREFIX = 'batch-report:';

function isBatchReport(value: unknown): value is BatchReport {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'batchId' in value &&
    typeof value.batchId === 'string' &&
    'accepted' in value &&
    Array.isArray(value.accepted) &&
    'counts' in value &&
    typeof value.counts === 'object'
  );
}

@Injectable()
export class ReportCacheService {
  private readonly logger = new Logger(ReportCacheService.name);
  private readonly ttlSeconds: number;

  constructor(
    private readonly redis: RedisService,
    config: ConfigService,
  ) {
    const settings = config.get<IngestionConfig>('ingestion') ?? loadIngestionConfig({});
    this.ttlSeconds = settings.reportTtlSeconds;
  }

  async save(report: BatchReport): Promise<void> {
    await this.redis.set(`${REDIS_PREFIX}${report.batchId}`, JSON.stringify(report), this.ttlSeconds);
  }

  /** Null when the report expired, was never written, or Redis is down. */
  async get(batchId: string): Promise<BatchReport | null> {
    const raw = await this.redis.get(`${REDIS_PREFIX}${batchId}`);
    if (raw === null) return null;

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isBatchReport(parsed)) return parsed;
      this.logger.warn(`Ignoring malformed cached report for batch ${batchId}`);
    } catch (err) {
      this.logger.warn(`Cached report for batch ${batchId} is not JSON: ${String(err)}`);
    }
    return null;
  }

  async invalidate(batchId: string): Promise<void> {
    await this.redis.del(`${REDIS_PREFIX}${batchId}`);
  }
}
