import type { ConfigService } from '@nestjs/config';
import {
  BatchCancelledError,
  StorageUnavailableError,
} from '../../common/errors/ingestion.errors';
import type { DatabaseService } from '../../database/database.service';
import { FaultyStore, openTestStore, rawRow, testConfig } from '../../testing/voter-store.fixtures';
import type { VotersRepository } from '../voters/voters.repository';
import { CommitterService } from './committer.service';
import { IngestionService } from './ingestion.service';

describe('IngestionService', () => {
  let database: DatabaseService;
  let repo: VotersRepository;
  let store: FaultyStore;

  function service(config: ConfigService = testConfig()): IngestionService {
    return new IngestionService(store, new CommitterService(store, config), config);
  }

  beforeEach(() => {
    ({ database, repo } = openTestStore());
    store = new FaultyStore(repo);
  });

  afterEach(() => database.onModuleDestroy());

  const roster = [
    rawRow(0, { name: 'Asha Rao', age: '34', gender: 'F', constituency: 'North', boothNo: 'B01' }),
    rawRow(1, { name: 'Ravi Kumar', age: '40', gender: 'M', constituency: 'North', boothNo: 'B02' }),
    rawRow(2, { name: 'Meena Iyer', age: '29', gender: 'F', constituency: 'South', boothNo: 'B01' }),
  ];

  it('commits the first of two case-variant rows and skips the second', async () => {
    const report = await service().ingest(
      [
        rawRow(0, { name: 'Asha Rao', age: '34', gender: 'F', constituency: 'North', boothNo: 'B01' }),
        rawRow(1, { name: 'asha rao', age: '34', gender: 'female', constituency: 'north', boothNo: 'b01' }),
      ],
      { batchId: 'batch-asha' },
    );

    expect(report).toEqual({
      batchId: 'batch-asha',
      accepted: [1],
      skippedDuplicates: 1,
      rejected: [],
      needsReview: [],
      failed: [],
      counts: { new: 1, exact_duplicate: 1, probable_duplicate: 0, conflict: 0, rejected: 0, failed: 0 },
      cancelled: false,
    });
    expect(await repo.findById(1)).toMatchObject({
      name: 'Asha Rao',
      gender: 'female',
      constituency: 'North',
      boothNo: 'B01',
      sourceBatchId: 'batch-asha',
    });
  });

  it('assigns a batch id when none is given', async () => {
    const report = await service().ingest(roster);
    expect(report.batchId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('is idempotent across reruns of the same roster', async () => {
    const first = await service().ingest(roster);
    const second = await service().ingest(roster);

    expect(first.accepted).toEqual([1, 2, 3]);
    expect(second.accepted).toEqual([]);
    expect(second.skippedDuplicates).toBe(first.accepted.length);
    expect(await repo.count()).toBe(3);
  });

  it('keeps the earliest row of an in-batch natural key, in either order', async () => {
    const a = rawRow(0, { name: 'Asha Rao', age: '34', constituency: 'North', boothNo: 'B01' });
    const b = rawRow(1, { name: 'Asha Rao', age: '50', constituency: 'North', boothNo: 'B01' });

    await service().ingest([a, b]);
    expect((await repo.findById(1))?.age).toBe(34);

    database.onModuleDestroy();
    ({ database, repo } = openTestStore());
    store = new FaultyStore(repo);

    await service().ingest([{ ...b, rowIndex: 0 }, { ...a, rowIndex: 1 }]);
    expect((await repo.findById(1))?.age).toBe(50);
  });

  it('rejects a nameless row without failing the batch', async () => {
    const rows = Array.from({ length: 10 }, (_, i) =>
      rawRow(i, {
        name: i === 5 ? '' : `Voter ${String.fromCharCode(65 + i)}`,
        age: String(20 + i),
        constituency: `Ward ${i}`,
        boothNo: 'B01',
      }),
    );

    const report = await service().ingest(rows);

    expect(report.rejected).toEqual([{ sourceDocumentId: 'roll-1', rowIndex: 5, reason: 'missing_name' }]);
    expect(report.accepted).toHaveLength(9);
    expect(report.counts.new + report.counts.exact_duplicate + report.counts.probable_duplicate + report.counts.conflict).toBe(9);
  });

  it('rejects a verbatim repeat of a row', async () => {
    const report = await service().ingest([roster[0], { ...roster[0], rowIndex: 1 }]);

    expect(report.rejected).toEqual([{ sourceDocumentId: 'roll-1', rowIndex: 1, reason: 'duplicate_within_row_set' }]);
    expect(report.accepted).toEqual([1]);
  });

  it('never matches voters across constituencies', async () => {
    const report = await service().ingest([
      rawRow(0, { name: 'Asha Rao', age: '34', constituency: 'North', boothNo: 'B01' }),
      rawRow(1, { name: 'Asha Rao', age: '34', constituency: 'South', boothNo: 'B01' }),
    ]);

    expect(report.needsReview).toEqual([]);
    expect(report.accepted).toEqual([1, 2]);
  });

  it('routes near matches to review and never commits them', async () => {
    await service().ingest([roster[0]]);

    const probable = rawRow(0, { name: 'Asha Rao', age: '34', gender: 'F', constituency: 'North', boothNo: 'B02' });
    const conflict = rawRow(1, { name: 'Asha Rao', age: '56', gender: 'F', constituency: 'North', boothNo: 'B03' });
    const report = await service().ingest([probable, conflict]);

    expect(report.accepted).toEqual([]);
    expect(report.needsReview).toEqual([
      {
        sourceDocumentId: 'roll-1',
        rowIndex: 0,
        classification: 'probable_duplicate',
        matchedVoterId: 1,
        matchedRowIndex: null,
        score: expect.closeTo(0.925, 10),
        record: probable,
      },
      {
        sourceDocumentId: 'roll-1',
        rowIndex: 1,
        classification: 'conflict',
        matchedVoterId: 1,
        matchedRowIndex: null,
        score: expect.closeTo(0.675, 10),
        record: conflict,
      },
    ]);
    expect(await repo.count()).toBe(1);
  });

  it('matches near duplicates against earlier rows of the same batch', async () => {
    const report = await service().ingest([
      rawRow(0, { name: 'Asha Rao', age: '34', constituency: 'North', boothNo: 'B01' }),
      rawRow(1, { name: 'Asha Rao', age: '34', constituency: 'North', boothNo: 'B02' }),
    ]);

    expect(report.accepted).toEqual([1]);
    expect(report.needsReview).toHaveLength(1);
    expect(report.needsReview[0]).toMatchObject({
      rowIndex: 1,
      classification: 'probable_duplicate',
      matchedVoterId: null,
      matchedRowIndex: 0,
    });
  });

  it('commits accepted rows in row order across constituency partitions', async () => {
    const report = await service(testConfig({ INGEST_CONCURRENCY: '2' })).ingest([
      rawRow(0, { name: 'Asha Rao', constituency: 'North', boothNo: 'B01' }),
      rawRow(1, { name: 'Meena Iyer', constituency: 'South', boothNo: 'B01' }),
      rawRow(2, { name: 'Ravi Kumar', constituency: 'North', boothNo: 'B02' }),
    ]);

    expect(report.accepted).toEqual([1, 2, 3]);
    expect((await repo.findById(2))?.name).toBe('Meena Iyer');
    expect(store.readCalls).toBe(2);
  });

  it('keeps the first group when storage fails on the second of three', async () => {
    store.failCommitOn.set(2, () => new StorageUnavailableError('commitGroup', 'disk gone'));

    const report = await service(testConfig({ INGEST_COMMIT_GROUP_SIZE: '1' })).ingest(roster);

    expect(report.accepted).toEqual([1]);
    expect(report.failed).toEqual([
      { sourceDocumentId: 'roll-1', rowIndex: 1, reason: 'storage_unavailable' },
      { sourceDocumentId: 'roll-1', rowIndex: 2, reason: 'storage_unavailable' },
    ]);
    expect(report.counts).toEqual({
      new: 1,
      exact_duplicate: 0,
      probable_duplicate: 0,
      conflict: 0,
      rejected: 0,
      failed: 2,
    });
    expect((await repo.findById(1))?.name).toBe('Asha Rao');
  });

  it('fails the whole batch when the store cannot be read', async () => {
    store.failReads = () => new StorageUnavailableError('findByConstituency', 'connection refused');

    await expect(service().ingest(roster)).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(store.commitCalls).toBe(0);
    expect(await repo.count()).toBe(0);
  });

  it('rejects a batch cancelled before it starts', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(service().ingest(roster, { signal: controller.signal })).rejects.toBeInstanceOf(
      BatchCancelledError,
    );
    expect(store.readCalls).toBe(0);
  });

  it('reports the rest as failed when cancelled during commit', async () => {
    const controller = new AbortController();
    store.afterCommit = (call) => {
      if (call === 1) controller.abort();
    };

    const report = await service(testConfig({ INGEST_COMMIT_GROUP_SIZE: '1' })).ingest(roster, {
      signal: controller.signal,
    });

    expect(report.cancelled).toBe(true);
    expect(report.accepted).toEqual([1]);
    expect(report.failed.map((f) => f.reason)).toEqual(['cancelled', 'cancelled']);
    expect(await repo.count()).toBe(1);
  });

  it('commits each row once when two batches race', async () => {
    const [first, second] = await Promise.all([service().ingest(roster), service().ingest(roster)]);

    expect(first.accepted.length + second.accepted.length).toBe(3);
    expect(first.skippedDuplicates + second.skippedDuplicates).toBe(3);
    expect(await repo.count()).toBe(3);
    for (const report of [first, second]) {
      expect(report.counts.new).toBe(report.accepted.length);
      expect(report.counts.exact_duplicate).toBe(report.skippedDuplicates);
      expect(report.counts.failed).toBe(0);
    }
  });

  it('counts a key taken after the snapshot as an exact duplicate', async () => {
    store.afterRead = async () => {
      await service().ingest([roster[1]], { batchId: 'rival' });
    };

    const report = await service().ingest(roster, { batchId: 'batch-late' });

    expect(report.accepted).toEqual([2, 3]);
    expect(report.skippedDuplicates).toBe(1);
    expect(report.counts).toEqual({
      new: 2,
      exact_duplicate: 1,
      probable_duplicate: 0,
      conflict: 0,
      rejected: 0,
      failed: 0,
    });
    expect((await repo.findById(1))?.sourceBatchId).toBe('rival');
  });

  it('ingests a CSV source and enforces its booth column', async () => {
    const report = await service().ingestSource({
      format: 'csv',
      documentId: 'roll.csv',
      text: 'Name,Age,Constituency,Booth No\nAsha Rao,34,North,B01\nRavi Kumar,40,North,\n',
    });

    expect(report.accepted).toEqual([1]);
    expect(report.rejected).toEqual([{ sourceDocumentId: 'roll.csv', rowIndex: 1, reason: 'missing_booth_no' }]);
  });
});
