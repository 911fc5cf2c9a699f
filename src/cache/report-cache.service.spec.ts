import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RedisService } from '../redis/redis.service';
import { testConfig } from '../testing/voter-store.fixtures';
import type { BatchReport } from '../modules/ingestion/ingestion.service';
import { ReportCacheService } from './report-cache.service';

class InMemoryRedis {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number | undefined>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.values.set(key, value);
    this.ttls.set(key, ttlSeconds);
  }

  async del(key: string): Promise<void> {
    this.values.delete(key);
  }
}

const report: BatchReport = {
  batchId: '6f1c2c1e-1111-4222-8333-944445555666',
  accepted: [1, 2],
  skippedDuplicates: 1,
  rejected: [{ sourceDocumentId: 'roll-1', rowIndex: 3, reason: 'missing_name' }],
  needsReview: [],
  failed: [],
  counts: { new: 2, exact_duplicate: 1, probable_duplicate: 0, conflict: 0, rejected: 1, failed: 0 },
  cancelled: false,
};

describe('ReportCacheService', () => {
  let redis: InMemoryRedis;
  let cache: ReportCacheService;

  beforeEach(async () => {
    redis = new InMemoryRedis();
    const moduleRef = await Test.createTestingModule({
      providers: [
        ReportCacheService,
        { provide: RedisService, useValue: redis },
        { provide: ConfigService, useValue: testConfig({ INGEST_REPORT_TTL_SECONDS: '600' }) },
      ],
    }).compile();

    cache = moduleRef.get(ReportCacheService);
  });

  it('stores the report under its batch id with the configured TTL', async () => {
    await cache.save(report);

    const key = `batch-report:${report.batchId}`;
    expect(redis.ttls.get(key)).toBe(600);
    expect(await cache.get(report.batchId)).toEqual(report);
  });

  it('returns null for an unknown batch', async () => {
    expect(await cache.get('missing')).toBeNull();
  });

  it('ignores entries that are not reports', async () => {
    await redis.set('batch-report:broken', '{"hello":"world"}');
    await redis.set('batch-report:garbage', 'not json');

    expect(await cache.get('broken')).toBeNull();
    expect(await cache.get('garbage')).toBeNull();
  });

  it('drops a report on invalidate', async () => {
    await cache.save(report);
    await cache.invalidate(report.batchId);
    expect(await cache.get(report.batchId)).toBeNull();
  });
});
